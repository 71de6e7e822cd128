import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';

/**
 * Environment variable schema with strict validation
 * Enforces P7 (explicit error handling) and P4 (explicitness)
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Data storage
  SQLITE_DB_PATH: z.string().min(1).default('./data/records.db'),
  SQLITE_JOURNAL_MODE: z.enum(['WAL', 'DELETE', 'MEMORY']).default('WAL'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.preprocess((value) => (value === '' ? undefined : value), z.string().optional()),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates and parses environment variables.
 * Throws ConfigError listing every issue (fail-fast principle).
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Environment validation failed: ${issues.join('; ')}`, { issues });
    }
    throw error;
  }
}
