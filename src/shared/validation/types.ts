/**
 * Validation Types
 *
 * Type definitions for validation results and errors.
 */

/**
 * Validation error for a specific field
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Result of validation
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Result of parsing an unknown value against a schema
 */
export type ParseOutcome<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };
