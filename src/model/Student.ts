/**
 * Student — One student record with its own field validation.
 *
 * A Student is immutable apart from `updatedAt`, which only
 * touchUpdatedAt() changes. The controller applies edits by building a
 * new Student from merged values, validating it, and only then storing it.
 */

import type { StudentField, ValidationError, ValidationResult } from '../types/common.js';
import type {
  StudentFields,
  StudentInput,
  StudentRecord,
  StudentRecordInput,
} from '../types/StudentRecord.js';
import {
  validateId,
  validateName,
  validateEmail,
  validateAge,
  validateMajor,
  validateGpa,
  type FieldCheck,
} from './FieldValidators.js';
import { formatTimestamp } from './timestamp.js';

/**
 * Fill missing attributes with empty values.
 */
function withDefaults(input: StudentInput): StudentFields {
  return {
    id: input.id ?? '',
    name: input.name ?? '',
    email: input.email ?? '',
    age: input.age ?? 0,
    major: input.major ?? '',
    gpa: input.gpa ?? 0,
  };
}

export class Student implements StudentRecord {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly age: number;
  readonly major: string;
  readonly gpa: number;
  readonly createdAt: string;
  private _updatedAt: string;

  private constructor(fields: StudentFields, createdAt: string, updatedAt: string) {
    this.id = fields.id;
    this.name = fields.name;
    this.email = fields.email;
    this.age = fields.age;
    this.major = fields.major;
    this.gpa = fields.gpa;
    this.createdAt = createdAt;
    this._updatedAt = updatedAt;
  }

  /**
   * Build a new student; both timestamps are set to `now`.
   */
  static create(input: StudentInput = {}, now: Date = new Date()): Student {
    const stamp = formatTimestamp(now);
    return new Student(withDefaults(input), stamp, stamp);
  }

  /**
   * Rebuild a student from its serialized form.
   *
   * Timestamps present in the map are kept as they are; a missing one is
   * stamped with `now`.
   */
  static deserialize(map: StudentRecordInput, now: Date = new Date()): Student {
    const stamp = formatTimestamp(now);
    return new Student(
      withDefaults(map),
      map.createdAt ?? stamp,
      map.updatedAt ?? stamp,
    );
  }

  get updatedAt(): string {
    return this._updatedAt;
  }

  /**
   * Refresh the last-modified timestamp.
   */
  touchUpdatedAt(now: Date = new Date()): void {
    this._updatedAt = formatTimestamp(now);
  }

  /**
   * Validate every field, in the order id, name, email, age, major, gpa.
   */
  validate(existingIds: Iterable<string> = []): ValidationResult {
    return Student.validateFields(this, existingIds);
  }

  /**
   * Validate field values that may not have been type-checked yet.
   *
   * All failures are collected. The id is reported as a duplicate only when
   * it is otherwise well formed.
   */
  static validateFields(
    fields: Record<StudentField, unknown>,
    existingIds: Iterable<string> = [],
  ): ValidationResult {
    const errors: ValidationError[] = [];
    const collect = (field: StudentField, check: FieldCheck): void => {
      if (!check.valid) {
        errors.push({ field, keyword: check.keyword, message: check.message });
      }
    };

    const idCheck = validateId(fields.id);
    if (!idCheck.valid) {
      collect('id', idCheck);
    } else if (typeof fields.id === 'string' && new Set(existingIds).has(fields.id)) {
      errors.push({ field: 'id', keyword: 'unique', message: 'Student ID already exists' });
    }

    collect('name', validateName(fields.name));
    collect('email', validateEmail(fields.email));
    collect('age', validateAge(fields.age));
    collect('major', validateMajor(fields.major));
    collect('gpa', validateGpa(fields.gpa));

    return { valid: errors.length === 0, errors };
  }

  /**
   * Plain field-name-keyed copy of this student.
   */
  serialize(): StudentRecord {
    return {
      id: this.id,
      name: this.name,
      email: this.email,
      age: this.age,
      major: this.major,
      gpa: this.gpa,
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
    };
  }

  toString(): string {
    return (
      `Student(ID: ${this.id}, Name: ${this.name}, Email: ${this.email}, ` +
      `Age: ${this.age}, Major: ${this.major}, GPA: ${this.gpa.toFixed(2)})`
    );
  }
}
