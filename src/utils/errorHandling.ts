/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (error)` blocks, where the caught value is
 * `unknown` and may not be an Error at all.
 */

import { isApplicationError } from '../errors/index.js';

/**
 * Type guard to check if value is an Error object
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Type guard to check if error has a message property
 */
export function hasMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Type guard to check if error has a code property
 */
export function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

/**
 * Safely extract error message from unknown error
 * Handles Error objects, objects with message, strings, and unknown values
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }

  if (hasMessage(error)) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}

/**
 * Safely extract error stack trace from unknown error
 */
export function getErrorStack(error: unknown): string | undefined {
  return isError(error) ? error.stack : undefined;
}

/**
 * Safely extract error code from unknown error
 * ApplicationError codes win over driver codes (e.g. SQLITE_CONSTRAINT)
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isApplicationError(error)) {
    return error.code;
  }

  if (hasCode(error)) {
    return error.code;
  }

  return undefined;
}

/**
 * Create standardized error log context from unknown error
 * Returns structured object suitable for logger calls
 */
export function createErrorLogContext(
  error: unknown,
  additionalContext?: Record<string, unknown>
): {
  message: string;
  stack?: string;
  code?: string;
  [key: string]: unknown;
} {
  const stack = getErrorStack(error);
  const code = getErrorCode(error);

  return {
    message: getErrorMessage(error),
    ...(stack && { stack }),
    ...(code && { code }),
    ...(isApplicationError(error) && { context: error.context }),
    ...additionalContext,
  };
}
