/**
 * Configuration exports.
 */

export * from './types.js';
export {
  loadConfig,
  validateConfig,
  applyDefaults,
  ConfigValidationError,
  type LoadConfigOptions,
} from './loader.js';
