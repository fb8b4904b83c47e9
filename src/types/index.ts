/**
 * Type exports for student-records.
 */

export * from './common.js';
export * from './StudentRecord.js';
