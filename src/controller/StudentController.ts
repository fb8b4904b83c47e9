/**
 * StudentController — Create, read, update, delete, search and report on
 * student records.
 *
 * The controller is the only writer of its StudentStore. Every mutation is
 * validated first and then applied with a single store call, so a failed
 * operation leaves the collection exactly as it was.
 */

import { Student } from '../model/Student.js';
import { systemClock, type Clock } from '../model/timestamp.js';
import type { StudentField, ValidationError } from '../types/common.js';
import type {
  StudentInput,
  StudentRecord,
  StudentUpdate,
} from '../types/StudentRecord.js';
import { MUTABLE_FIELDS } from '../types/StudentRecord.js';
import type { StudentStore } from '../store/types.js';
import { createStudentStore } from '../store/InMemoryStudentStore.js';
import type {
  ControllerErrorKind,
  OperationFailure,
  OperationResult,
  SearchField,
  StudentStatistics,
} from './types.js';
import { SEARCH_FIELDS, isSearchField } from './types.js';

/**
 * Options for constructing a controller.
 */
export interface StudentControllerOptions {
  /** Backing store (default: a new empty in-memory store) */
  store?: StudentStore;
  /** Time source for timestamps (default: system clock) */
  clock?: Clock;
}

function ok<T>(message: string, value: T): OperationResult<T> {
  return { success: true, message, value };
}

function fail(kind: ControllerErrorKind, message: string, details: string[] = []): OperationFailure {
  return { success: false, message, error: { kind, details } };
}

function validationFailure(errors: ValidationError[]): OperationFailure {
  const messages = errors.map(e => e.message);
  return fail(
    'validation',
    'Validation failed:\n' + messages.map(m => `- ${m}`).join('\n'),
    messages,
  );
}

function emptyIdFailure(): OperationFailure {
  return fail('request', 'Student ID cannot be empty.');
}

function notFoundFailure(id: string): OperationFailure {
  return fail('not-found', `Student with ID '${id}' not found.`);
}

/**
 * Round to `digits` decimals, ties to the even digit.
 *
 * Works on the exact decimal expansion of the double, so 3.125 (exact)
 * rounds to 3.12 while 2.675 (stored just below) rounds to 2.67.
 */
function roundHalfEven(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const [whole = '0', fraction = ''] = Math.abs(value).toFixed(100).split('.');
  const rest = fraction.slice(digits);
  let scaled = BigInt(whole + fraction.slice(0, digits));

  const next = rest.charAt(0);
  const tie = next === '5' && !/[1-9]/.test(rest.slice(1));
  if (next > '5' || (next === '5' && !tie) || (tie && scaled % 2n === 1n)) {
    scaled += 1n;
  }

  const text = scaled.toString().padStart(digits + 1, '0');
  const rounded = digits > 0 ? Number(`${text.slice(0, -digits)}.${text.slice(-digits)}`) : Number(text);
  return value < 0 ? -rounded : rounded;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * StudentController — owns one collection of students.
 */
export class StudentController {
  private readonly store: StudentStore;
  private readonly clock: Clock;

  constructor(options: StudentControllerOptions = {}) {
    this.store = options.store ?? createStudentStore();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Run an operation, turning an unexpected exception into an internal
   * failure. Mutations happen in one store call after all checks, so
   * nothing is half-applied when this fires.
   */
  private guard<T>(action: string, operation: () => OperationResult<T>): OperationResult<T> {
    try {
      return operation();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return fail('internal', `Error ${action}: ${message}`, [message]);
    }
  }

  /**
   * Create a student. Missing fields default to empty string or zero.
   */
  create(input: StudentInput): OperationResult<Student> {
    return this.guard<Student>('creating student', () => {
      const student = Student.create(input, this.clock());
      const validation = student.validate(this.store.ids());

      if (!validation.valid) {
        return validationFailure(validation.errors);
      }

      this.store.append(student.serialize());
      return ok(`Student ${student.name} (ID: ${student.id}) created successfully!`, student);
    });
  }

  /**
   * All students in insertion order.
   */
  readAll(): OperationResult<Student[]> {
    return this.guard<Student[]>('retrieving students', () => {
      const rows = this.store.list();
      if (rows.length === 0) {
        return ok('No students found in the system.', []);
      }

      const students = rows.map(row => Student.deserialize(row));
      return ok(`Found ${students.length} student(s).`, students);
    });
  }

  /**
   * Look up one student by exact id.
   */
  readById(id: string): OperationResult<Student> {
    return this.guard<Student>('retrieving student', () => {
      if (!id) {
        return emptyIdFailure();
      }

      const row = this.store.at(this.store.indexOf(id));
      if (!row) {
        return notFoundFailure(id);
      }

      return ok('Student found successfully.', Student.deserialize(row));
    });
  }

  /**
   * Merge `changes` into the student with this id.
   *
   * Only name, email, age, major and gpa are applied; an `id` in
   * `changes` is ignored. Present keys are merged whatever their runtime
   * type, and the merged record is validated against the ids of every
   * other record before it replaces the stored one in place.
   */
  update(id: string, changes: StudentUpdate): OperationResult<Student> {
    return this.guard<Student>('updating student', () => {
      if (!id) {
        return emptyIdFailure();
      }

      const index = this.store.indexOf(id);
      const current = this.store.at(index);
      if (!current) {
        return notFoundFailure(id);
      }

      // Every present key is merged as given; validation rejects wrong types
      const candidate: Record<StudentField, unknown> = { ...current };
      for (const field of MUTABLE_FIELDS) {
        const value: unknown = changes[field];
        if (value !== undefined) candidate[field] = value;
      }

      const otherIds = this.store.ids().filter((_, i) => i !== index);
      const validation = Student.validateFields(candidate, otherIds);

      if (!validation.valid) {
        return validationFailure(validation.errors);
      }

      const updated = Student.deserialize({
        ...current,
        name: typeof candidate.name === 'string' ? candidate.name : current.name,
        email: typeof candidate.email === 'string' ? candidate.email : current.email,
        age: typeof candidate.age === 'number' ? candidate.age : current.age,
        major: typeof candidate.major === 'string' ? candidate.major : current.major,
        gpa: typeof candidate.gpa === 'number' ? candidate.gpa : current.gpa,
      });
      updated.touchUpdatedAt(this.clock());
      this.store.replaceAt(index, updated.serialize());

      return ok(`Student ${updated.name} (ID: ${id}) updated successfully!`, updated);
    });
  }

  /**
   * Remove the student with this id.
   */
  delete(id: string): OperationResult<StudentRecord> {
    return this.guard<StudentRecord>('deleting student', () => {
      if (!id) {
        return emptyIdFailure();
      }

      const removed = this.store.removeAt(this.store.indexOf(id));
      if (!removed) {
        return notFoundFailure(id);
      }

      return ok(`Student ${removed.name} (ID: ${id}) deleted successfully!`, removed);
    });
  }

  /**
   * Case-insensitive substring search in one field.
   */
  search(term: string, field: string = 'name'): OperationResult<Student[]> {
    return this.guard<Student[]>('searching students', () => {
      if (!term) {
        return fail('request', 'Search term cannot be empty.');
      }

      if (!isSearchField(field)) {
        return fail('request', `Invalid search field. Valid fields: ${SEARCH_FIELDS.join(', ')}`);
      }
      const searchField: SearchField = field;

      const needle = term.toLowerCase();
      const matches = this.store
        .list()
        .filter(row => String(row[searchField]).toLowerCase().includes(needle))
        .map(row => Student.deserialize(row));

      if (matches.length === 0) {
        return ok(`No students found matching '${term}' in ${field}.`, []);
      }

      return ok(
        `Found ${matches.length} student(s) matching '${term}' in ${field}.`,
        matches,
      );
    });
  }

  /**
   * Aggregate figures, or null when there are no students.
   */
  statistics(): OperationResult<StudentStatistics | null> {
    return this.guard<StudentStatistics | null>('calculating statistics', () => {
      const rows = this.store.list();
      if (rows.length === 0) {
        return ok('No students in the system.', null);
      }

      const gpas = rows.map(row => row.gpa);
      const majorDistribution = new Map<string, number>();
      for (const row of rows) {
        majorDistribution.set(row.major, (majorDistribution.get(row.major) ?? 0) + 1);
      }

      return ok('Statistics calculated successfully.', {
        totalStudents: rows.length,
        averageGpa: roundHalfEven(mean(gpas), 2),
        highestGpa: Math.max(...gpas),
        lowestGpa: Math.min(...gpas),
        averageAge: roundHalfEven(mean(rows.map(row => row.age)), 1),
        majorDistribution,
      });
    });
  }

  /**
   * Copy of every stored row, timestamps included.
   */
  exportAll(): OperationResult<StudentRecord[]> {
    return this.guard<StudentRecord[]>('exporting data', () => {
      const rows = this.store.list();
      return ok(`Exported ${rows.length} student records.`, rows);
    });
  }

  /**
   * Replace the collection with `rows`, all or nothing.
   *
   * Each row is checked against the ids of the rows accepted before it.
   * If any row fails, nothing is imported and the current collection
   * stays as it is.
   */
  importAll(rows: readonly StudentRecord[]): OperationResult<number> {
    return this.guard<number>('importing data', () => {
      const accepted: Student[] = [];
      const acceptedIds = new Set<string>();
      const rowErrors: string[] = [];

      rows.forEach((row, i) => {
        const student = Student.deserialize(row, this.clock());
        const validation = student.validate(acceptedIds);

        if (validation.valid) {
          accepted.push(student);
          acceptedIds.add(student.id);
        } else {
          rowErrors.push(`Row ${i + 1}: ${validation.errors.map(e => e.message).join(', ')}`);
        }
      });

      if (rowErrors.length > 0) {
        return fail(
          'validation',
          'Import failed due to validation errors:\n' + rowErrors.join('\n'),
          rowErrors,
        );
      }

      this.store.replaceAll(accepted.map(student => student.serialize()));
      return ok(`Successfully imported ${accepted.length} student records.`, accepted.length);
    });
  }
}

/**
 * Create a controller over a fresh in-memory store.
 */
export function createStudentController(options?: StudentControllerOptions): StudentController {
  return new StudentController(options);
}
