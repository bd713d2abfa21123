import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { SchemaValidationError, type ErrorContext } from '../errors/index.js';
import { logger } from '../utils/logger.js';

/**
 * Parse a value against a Zod schema, raising SchemaValidationError on failure
 *
 * @example
 * ```typescript
 * const seeds = validate(musicVideoSeedListSchema, input, { operation: 'seed' });
 * ```
 */
export function validate<Output, Input = Output>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  value: unknown,
  context?: ErrorContext
): Output {
  try {
    return schema.parse(value);
  } catch (error) {
    if (error instanceof ZodError) {
      const formattedErrors = error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));

      logger.warn('Input validation failed', {
        ...context,
        errors: formattedErrors,
      });

      throw new SchemaValidationError(formattedErrors, undefined, context);
    }
    throw error;
  }
}
