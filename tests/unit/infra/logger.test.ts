import { describe, expect, it } from 'vitest';
import { redactSecrets } from '../../../src/infra/logger.js';

describe('redactSecrets', () => {
  it('masks secret keys in nested objects', () => {
    expect(redactSecrets({ user: 'ann', password: 'test-secret', nested: { token: 'abc' } })).toEqual({
      user: 'ann',
      password: '***REDACTED***',
      nested: { token: '***REDACTED***' },
    });
  });

  it('masks inline secrets in strings', () => {
    expect(redactSecrets('connect with password=test-secret now')).toBe(
      'connect with password=***REDACTED*** now'
    );
  });

  it('leaves errors and primitives alone', () => {
    const error = new Error('boom');

    expect(redactSecrets(error)).toBe(error);
    expect(redactSecrets(42)).toBe(42);
    expect(redactSecrets(['token: abc'])).toEqual(['token: ***REDACTED***']);
  });
});
