/**
 * Student store exports.
 */

export type { StudentStore, StudentStoreConfig } from './types.js';
export { InMemoryStudentStore, createStudentStore } from './InMemoryStudentStore.js';
