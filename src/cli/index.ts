/**
 * CLI exports.
 */

export { StudentMenu, type StudentMenuOptions } from './StudentMenu.js';
export { createTerminalIO, type MenuIO, type TerminalIO } from './io.js';
export { InputClosedError } from './prompts.js';
