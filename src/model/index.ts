/**
 * Record model exports.
 */

export { Student } from './Student.js';
export * from './FieldValidators.js';
export { formatTimestamp, systemClock, type Clock } from './timestamp.js';
