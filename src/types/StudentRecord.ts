/**
 * StudentRecord — the plain, field-name-keyed form of a student.
 * 
 * This is what the store holds and what export/import exchange.
 * Timestamps use the `YYYY-MM-DD HH:MM:SS` form (local time).
 */

/**
 * Editable attributes of a student.
 */
export interface StudentFields {
  id: string;
  name: string;
  email: string;
  age: number;
  major: string;
  gpa: number;
}

/**
 * A serialized student: attributes plus timestamps.
 */
export interface StudentRecord extends StudentFields {
  createdAt: string;
  updatedAt: string;
}

/**
 * Input accepted by create. Missing fields default to empty string or zero.
 */
export type StudentInput = Partial<StudentFields>;

/**
 * Mapping accepted by deserialize. Missing timestamps are stamped with now.
 */
export type StudentRecordInput = Partial<StudentRecord>;

/**
 * Partial data accepted by update.
 * 
 * `id` is accepted so callers can pass a whole record back, but it is
 * never applied.
 */
export type StudentUpdate = Partial<StudentFields>;

/**
 * Attributes update may change.
 */
export const MUTABLE_FIELDS = ['name', 'email', 'age', 'major', 'gpa'] as const;

export type MutableField = typeof MUTABLE_FIELDS[number];
