/**
 * Types for the Student Controller.
 *
 * Every controller operation returns an OperationResult instead of
 * throwing. The CLI renders `message`; programmatic callers switch on
 * `success` and, for failures, on `error.kind`.
 */

/**
 * Failure families reported by the controller.
 *
 * - validation: one or more field rules failed (all are listed)
 * - not-found: no record has the requested id
 * - request: the request itself is malformed (empty id or term, bad field)
 * - internal: the store raised an unexpected error
 */
export type ControllerErrorKind = 'validation' | 'not-found' | 'request' | 'internal';

export interface ControllerError {
  kind: ControllerErrorKind;
  /** Individual problems, e.g. one entry per failed field or import row */
  details: string[];
}

export interface OperationSuccess<T> {
  success: true;
  message: string;
  value: T;
}

export interface OperationFailure {
  success: false;
  message: string;
  error: ControllerError;
}

/**
 * Result of a controller operation.
 */
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

/**
 * Fields search can look in.
 */
export const SEARCH_FIELDS = ['name', 'major', 'email', 'id'] as const;

export type SearchField = typeof SEARCH_FIELDS[number];

export function isSearchField(value: string): value is SearchField {
  return (SEARCH_FIELDS as readonly string[]).includes(value);
}

/**
 * Aggregate figures over the live collection.
 */
export interface StudentStatistics {
  totalStudents: number;
  /** Mean GPA rounded to 2 decimals */
  averageGpa: number;
  highestGpa: number;
  lowestGpa: number;
  /** Mean age rounded to 1 decimal */
  averageAge: number;
  /** Count of records per major, in order of first appearance */
  majorDistribution: Map<string, number>;
}
