/**
 * Validator Utilities
 *
 * Thin helpers over zod's safeParse that report errors as field/message pairs.
 */

import { z } from 'zod';
import { ParseOutcome, ValidationError, ValidationResult } from './types';

/**
 * Convert zod issues into field-level validation errors
 */
export function toValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.') || '(root)',
    message: err.message
  }));
}

/**
 * Parse an unknown value, returning the typed data or the field errors
 */
export function parseWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown
): ParseOutcome<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: toValidationErrors(result.error) };
}

/**
 * Validate an unknown value against a schema
 */
export function validateWithSchema(
  schema: z.ZodType<unknown, z.ZodTypeDef, unknown>,
  value: unknown
): ValidationResult {
  const outcome = parseWithSchema(schema, value);
  return outcome.success
    ? { isValid: true, errors: [] }
    : { isValid: false, errors: outcome.errors };
}

/**
 * Render validation errors as a single line for error details
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(err => `${err.field}: ${err.message}`).join('; ');
}
