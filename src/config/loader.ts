/**
 * Configuration loader for the student-records CLI.
 * 
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Relative paths resolved against the config file
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, CliConfig, PartialAppConfig, SampleDataConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 * 
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Validate CLI configuration.
 */
function validateCliConfig(config: unknown, path = 'cli'): asserts config is Partial<CliConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  
  for (const key of ['clearScreen', 'pauseAfterAction', 'confirmDelete'] as const) {
    const value = config[key];
    if (value !== undefined && typeof value !== 'boolean') {
      throw new ConfigValidationError(`${key} must be a boolean`, `${path}.${key}`, value);
    }
  }
}

/**
 * Validate sample data configuration.
 */
function validateSampleDataConfig(config: unknown, path = 'sampleData'): asserts config is Partial<SampleDataConfig> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  
  if (config.path !== undefined && (typeof config.path !== 'string' || config.path.length === 0)) {
    throw new ConfigValidationError('path must be a non-empty string', `${path}.path`, config.path);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }
  
  if (config.cli !== undefined) {
    validateCliConfig(config.cli);
  }
  
  if (config.sampleData !== undefined) {
    validateSampleDataConfig(config.sampleData);
  }
}

/**
 * Apply defaults to a validated partial configuration.
 * 
 * @param partial - Validated config.yaml contents
 * @param baseDir - Directory that relative paths resolve against
 */
export function applyDefaults(partial: PartialAppConfig, baseDir: string = process.cwd()): AppConfig {
  const samplePath = partial.sampleData?.path;
  
  return {
    cli: { ...DEFAULT_CONFIG.cli, ...partial.cli },
    sampleData: {
      path: samplePath !== undefined ? resolve(baseDir, samplePath) : DEFAULT_CONFIG.sampleData.path,
    },
  };
}

/**
 * Load configuration from a YAML file.
 * 
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath 
    ?? process.env.CONFIG_PATH 
    ?? './config.yaml';
  
  const absolutePath = resolve(configPath);
  
  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return applyDefaults({});
  }
  
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;
  
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }
  
  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {});
  
  validateConfig(substituted);
  
  return applyDefaults(substituted, dirname(absolutePath));
}
