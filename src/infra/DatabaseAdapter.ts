import Database from 'better-sqlite3';
import { DatabaseError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

export type SqlValue = string | number | bigint | Buffer | null;

/**
 * SQLite database adapter following P5 (separation of concerns)
 * Domain layer never imports this - accessed via dependency injection
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH' | 'SQLITE_JOURNAL_MODE'>) {
    try {
      this.db = new Database(env.SQLITE_DB_PATH);
      this.db.pragma(`journal_mode = ${env.SQLITE_JOURNAL_MODE}`);
      this.db.pragma('foreign_keys = ON');
      logger.info('Database initialized', { path: env.SQLITE_DB_PATH });
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', { error });
    }
  }

  /**
   * Run one or more DDL statements (schema files, fixtures)
   */
  exec(sql: string): void {
    try {
      this.db.exec(sql);
    } catch (error) {
      logger.error('Database exec failed', { error });
      throw new DatabaseError('Exec failed', { error });
    }
  }

  /**
   * Execute a query with parameters
   * P7 (Explicit error handling): Wraps errors in DatabaseError
   */
  query<T>(sql: string, params: SqlValue[] = []): T[] {
    try {
      return this.db.prepare<SqlValue[], T>(sql).all(...params);
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new DatabaseError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: SqlValue[] = []): T | null {
    try {
      return this.db.prepare<SqlValue[], T>(sql).get(...params) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new DatabaseError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows
   */
  execute(sql: string, params: SqlValue[] = []): number {
    try {
      return this.db.prepare<SqlValue[]>(sql).run(...params).changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new DatabaseError('Execute failed', { sql, error });
    }
  }

  /**
   * Execute multiple statements in a transaction
   * P7 (Explicit error handling): Rolls back on any error. Application errors
   * raised inside `fn` are rethrown as they are.
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn();
    } catch (error) {
      logger.error('Transaction failed, rolling back', { error });
      if (isAppError(error)) {
        throw error;
      }
      throw new DatabaseError('Transaction failed', { error });
    }
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }
}
