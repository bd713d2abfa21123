/**
 * Unified Error Hierarchy for chinook-reports
 *
 * Provides a consistent, type-safe error system with:
 * - Machine-readable error codes
 * - Rich context metadata
 * - Structured logging support
 */

/**
 * Error codes for machine-readable error classification
 * Format: CATEGORY_SPECIFIC_REASON
 */
export enum ErrorCode {
  // Validation Errors
  VALIDATION_INPUT_INVALID = 'VALIDATION_INPUT_INVALID',

  // Database Errors
  DATABASE_CONNECTION_FAILED = 'DATABASE_CONNECTION_FAILED',
  DATABASE_QUERY_FAILED = 'DATABASE_QUERY_FAILED',
  DATABASE_SCHEMA_MISSING = 'DATABASE_SCHEMA_MISSING',
  DATABASE_DUPLICATE_KEY = 'DATABASE_DUPLICATE_KEY',
  DATABASE_FOREIGN_KEY_VIOLATION = 'DATABASE_FOREIGN_KEY_VIOLATION',

  // Configuration Errors
  CONFIG_INVALID = 'CONFIG_INVALID',
}

/**
 * Error context metadata for structured logging and debugging
 */
export interface ErrorContext {
  /** Service/module name that threw the error */
  service?: string;

  /** Specific operation that failed (e.g., 'seed', 'getRevenueByGenre') */
  operation?: string;

  /** Additional arbitrary context data */
  metadata?: Record<string, unknown>;
}

/**
 * Base application error class
 * All custom errors in chinook-reports extend this class
 */
export abstract class ApplicationError extends Error {
  /**
   * Machine-readable error code
   */
  public readonly code: ErrorCode;

  /**
   * Rich context for logging and debugging
   */
  public readonly context: ErrorContext;

  /**
   * Timestamp when error was created
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);

    this.name = this.constructor.name;
    this.code = code;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serialize error for logging
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? {
        name: this.cause.name,
        message: this.cause.message,
        stack: this.cause.stack,
      } : undefined,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

export class ValidationError extends ApplicationError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.VALIDATION_INPUT_INVALID, {
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class SchemaValidationError extends ValidationError {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Schema validation failed: ${errors.length} error(s)`,
      { ...context, metadata: { ...context?.metadata, errors } }
    );
  }
}

// ============================================
// OPERATIONAL ERRORS
// ============================================

/**
 * Failures of the environment at run time (database, filesystem)
 */
export class OperationalError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

// Database Errors
export class DatabaseError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATABASE_QUERY_FAILED,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, context, cause);
  }
}

/**
 * A statement failed for a reason other than a constraint or a missing object
 */
export class QueryError extends DatabaseError {
  constructor(message: string, context?: ErrorContext, cause?: Error) {
    super(message, ErrorCode.DATABASE_QUERY_FAILED, context, cause);
  }
}

/**
 * A table or column the statement relies on does not exist
 */
export class SchemaError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly column?: string,
    message?: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message || (column
        ? `Missing column '${column}' on table '${table}'`
        : `Missing table '${table}'`),
      ErrorCode.DATABASE_SCHEMA_MISSING,
      { ...context, metadata: { ...context?.metadata, table, column } },
      cause
    );
  }
}

export class DuplicateKeyError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly key: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Duplicate key in table '${table}': ${key}`,
      ErrorCode.DATABASE_DUPLICATE_KEY,
      { ...context, metadata: { ...context?.metadata, table, key } }
    );
  }
}

export class ForeignKeyViolationError extends DatabaseError {
  constructor(
    public readonly table: string,
    public readonly constraint: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Foreign key violation in table '${table}': ${constraint}`,
      ErrorCode.DATABASE_FOREIGN_KEY_VIOLATION,
      { ...context, metadata: { ...context?.metadata, table, constraint } }
    );
  }
}

// File System Errors
export class FileSystemError extends OperationalError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly path: string,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(
      message,
      code,
      { ...context, metadata: { ...context?.metadata, path } },
      cause
    );
  }
}

// ============================================
// PERMANENT ERRORS
// ============================================

/**
 * Operator mistakes that no re-run fixes without a change (bad configuration)
 */
export class PermanentError extends ApplicationError {
  constructor(
    message: string,
    code: ErrorCode,
    context?: ErrorContext,
    cause?: Error
  ) {
    super(message, code, {
      ...(context && { context }),
      ...(cause && { cause }),
    });
  }
}

export class ConfigurationError extends PermanentError {
  constructor(
    public readonly configKey: string,
    message?: string,
    context?: ErrorContext
  ) {
    super(
      message || `Configuration error: ${configKey}`,
      ErrorCode.CONFIG_INVALID,
      { ...context, metadata: { ...context?.metadata, configKey } }
    );
  }
}

// ============================================
// HELPERS
// ============================================

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}
