/**
 * Common type definitions for student-records.
 * 
 * These types are shared by the model, the store and the controller.
 * They MUST NOT contain field rules or controller behaviour.
 */

/**
 * Field names of a student record, in validation order.
 */
export const STUDENT_FIELDS = ['id', 'name', 'email', 'age', 'major', 'gpa'] as const;

export type StudentField = typeof STUDENT_FIELDS[number];

/**
 * Rule family that produced a validation error.
 */
export type ValidationKeyword =
  | 'required'
  | 'minLength'
  | 'pattern'
  | 'type'
  | 'range'
  | 'unique';

/**
 * Validation error for a single field.
 */
export interface ValidationError {
  /** Field the error refers to */
  field: StudentField;
  /** Human-readable message */
  message: string;
  /** Rule that failed */
  keyword: ValidationKeyword;
}

/**
 * Result of validating a whole record.
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** List of validation errors (empty if valid), in field order */
  errors: ValidationError[];
}
