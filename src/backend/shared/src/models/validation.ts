/**
 * Schema Validation Helpers
 *
 * Turns zod failures into ValidationError with field-level details.
 *
 * @tested tests/property/error-taxonomy.property.test.ts
 */

import { z, type ZodError } from 'zod';
import { ErrorCode, ValidationError, type FieldErrorDetail } from './errors.js';

/**
 * Formats zod issues into field-level error details
 */
export function formatZodIssues(error: ZodError): FieldErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parses data with a schema, throwing ValidationError on failure
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  message = 'Request validation failed'
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(ErrorCode.INVALID_INPUT, message, formatZodIssues(result.error));
  }
  return result.data;
}
