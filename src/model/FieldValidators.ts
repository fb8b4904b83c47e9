/**
 * FieldValidators — Pure checks for individual student attributes.
 *
 * Each validator looks at one value and returns a FieldCheck. Values
 * arrive untyped from library callers, so each check starts with the
 * value's type. Validators never throw and never look at other fields; uniqueness of the id is
 * decided by Student.validate, which knows the existing ids.
 */

import type { ValidationKeyword } from '../types/common.js';

/**
 * Outcome of checking one field.
 */
export type FieldCheck =
  | { valid: true }
  | { valid: false; keyword: ValidationKeyword; message: string };

const PASS: FieldCheck = { valid: true };

function fail(keyword: ValidationKeyword, message: string): FieldCheck {
  return { valid: false, keyword, message };
}

const ID_PATTERN = /^[A-Za-z0-9]+$/;
const NAME_PATTERN = /^[A-Za-z ]+$/;
const EMAIL_PATTERN = /^[\w.%+-]+@[\w.-]+\.[A-Za-z]{2,}$/;

export const AGE_RANGE = { min: 16, max: 100 } as const;
export const GPA_RANGE = { min: 0, max: 4 } as const;

export function validateId(id: unknown): FieldCheck {
  if (typeof id !== 'string') {
    return fail('type', 'Student ID must be text');
  }
  if (!id) {
    return fail('required', 'Student ID cannot be empty');
  }
  if (id.length < 3) {
    return fail('minLength', 'Student ID must be at least 3 characters long');
  }
  if (!ID_PATTERN.test(id)) {
    return fail('pattern', 'Student ID must contain only letters and numbers');
  }
  return PASS;
}

export function validateName(name: unknown): FieldCheck {
  if (typeof name !== 'string') {
    return fail('type', 'Name must be text');
  }
  const trimmed = name.trim();
  if (!trimmed) {
    return fail('required', 'Name cannot be empty');
  }
  if (trimmed.length < 2) {
    return fail('minLength', 'Name must be at least 2 characters long');
  }
  // ASCII letters and spaces only
  if (!NAME_PATTERN.test(trimmed)) {
    return fail('pattern', 'Name must contain only letters and spaces');
  }
  return PASS;
}

export function validateEmail(email: unknown): FieldCheck {
  if (typeof email !== 'string') {
    return fail('type', 'Email must be text');
  }
  if (!email) {
    return fail('required', 'Email cannot be empty');
  }
  if (!EMAIL_PATTERN.test(email)) {
    return fail('pattern', 'Invalid email format');
  }
  return PASS;
}

export function validateAge(age: unknown): FieldCheck {
  if (typeof age !== 'number' || !Number.isInteger(age)) {
    return fail('type', 'Age must be a whole number');
  }
  if (age < AGE_RANGE.min || age > AGE_RANGE.max) {
    return fail('range', `Age must be between ${AGE_RANGE.min} and ${AGE_RANGE.max}`);
  }
  return PASS;
}

export function validateMajor(major: unknown): FieldCheck {
  if (typeof major !== 'string') {
    return fail('type', 'Major must be text');
  }
  const trimmed = major.trim();
  if (!trimmed) {
    return fail('required', 'Major cannot be empty');
  }
  if (trimmed.length < 2) {
    return fail('minLength', 'Major must be at least 2 characters long');
  }
  return PASS;
}

export function validateGpa(gpa: unknown): FieldCheck {
  if (typeof gpa !== 'number' || !Number.isFinite(gpa)) {
    return fail('type', 'GPA must be a number');
  }
  if (gpa < GPA_RANGE.min || gpa > GPA_RANGE.max) {
    return fail('range', 'GPA must be between 0.0 and 4.0');
  }
  return PASS;
}
