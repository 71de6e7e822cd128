import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../../src/domain/errors.js';
import { validateEnv } from '../../../src/infra/env.js';

describe('validateEnv', () => {
  it('applies defaults', () => {
    expect(validateEnv({})).toEqual({
      NODE_ENV: 'development',
      SQLITE_DB_PATH: './data/records.db',
      SQLITE_JOURNAL_MODE: 'WAL',
      LOG_LEVEL: 'info',
      LOG_FILE: undefined,
    });
  });

  it('treats an empty LOG_FILE as unset', () => {
    expect(validateEnv({ LOG_FILE: '' }).LOG_FILE).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    expect(() => validateEnv({ LOG_LEVEL: 'loud', SQLITE_JOURNAL_MODE: 'FAST' })).toThrow(ConfigError);

    try {
      validateEnv({ LOG_LEVEL: 'loud', SQLITE_JOURNAL_MODE: 'FAST' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(String(error)).toContain('SQLITE_JOURNAL_MODE');
      expect(String(error)).toContain('LOG_LEVEL');
    }
  });
});
