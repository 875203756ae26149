import type { ZodError, ZodIssue, ZodType, ZodTypeDef } from 'zod';
import {
  ValidationError,
  type ValidationErrorDetail,
} from '../types/errors.ts';

/**
 * Map Zod errors to validation error details
 */
export function mapZodErrors(error: ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue: ZodIssue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parse a value against a schema, throwing a ValidationError whose message
 * is the first issue's message.
 */
export function parseWith<TOutput, TInput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  value: unknown,
): TOutput {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const details = mapZodErrors(result.error);
  const first = details[0];
  const message = first
    ? first.path
      ? `${first.path}: ${first.message}`
      : first.message
    : 'Validation failed';

  throw new ValidationError(message, { details });
}
