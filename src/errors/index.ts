/**
 * Unified Error System Export
 *
 * All application errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  isApplicationError,
  type ErrorContext,
} from './ApplicationError.js';

// Validation errors
export {
  ValidationError,
  SchemaValidationError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  DatabaseError,
  QueryError,
  SchemaError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
} from './ApplicationError.js';

// Permanent errors
export {
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';
