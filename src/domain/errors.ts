/**
 * Error types for record-history
 * P7 (Explicit error handling): every failure surfaces as one of these,
 * nothing is logged and swallowed
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Business-rule rejection of an entity mutation (400 Bad Request)
 */
export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = [], details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, { issues, ...details });
    this.issues = issues;
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * A step after the first one in a versioned write failed; the whole
 * transaction was rolled back (500 Internal Server Error)
 */
export class TransactionStepError extends AppError {
  constructor(
    public readonly step: string,
    public readonly cause: unknown
  ) {
    super(`Transaction error in ${step}: ${describeCause(cause)}`, 'TRANSACTION_STEP_FAILED', 500, {
      step,
    });
  }
}

/**
 * Descriptor or call-site bug, e.g. an association value whose shape does not
 * match its declared cardinality. Never a runtime data condition.
 */
export class ContractViolationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONTRACT_VIOLATION', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === 'string' ? cause : JSON.stringify(cause);
}
