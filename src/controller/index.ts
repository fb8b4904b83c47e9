/**
 * Student controller exports.
 */

export { StudentController, createStudentController } from './StudentController.js';
export type { StudentControllerOptions } from './StudentController.js';
export * from './types.js';
