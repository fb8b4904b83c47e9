/**
 * student-records — In-memory student record manager.
 * 
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Record model and field validators
export * from './model/index.js';

// Record store
export * from './store/index.js';

// Controller
export * from './controller/index.js';

// Configuration
export * from './config/index.js';

// Sample data
export * from './data/index.js';

// Interactive menu
export * from './cli/index.js';
