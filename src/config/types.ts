/**
 * Configuration types for the student-records CLI.
 * 
 * These types define the structure of config.yaml and provide
 * type-safe access to CLI settings.
 */

import { fileURLToPath } from 'node:url';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  cli: CliConfig;
  sampleData: SampleDataConfig;
}

/**
 * Interactive menu behaviour.
 */
export interface CliConfig {
  /** Clear the terminal before showing the menu (default: true) */
  clearScreen: boolean;
  /** Wait for Enter after each action (default: true) */
  pauseAfterAction: boolean;
  /** Ask for yes/no before deleting (default: true) */
  confirmDelete: boolean;
}

/**
 * Sample roster used by the "Load Sample Data" entry.
 */
export interface SampleDataConfig {
  /** Path to the YAML roster; relative paths resolve against the config file */
  path: string;
}

/**
 * Shape of config.yaml before defaults are applied.
 */
export interface PartialAppConfig {
  cli?: Partial<CliConfig>;
  sampleData?: Partial<SampleDataConfig>;
}

/**
 * Bundled sample roster, located relative to this module so it is found
 * from both src/ and dist/.
 */
export const DEFAULT_SAMPLE_DATA_PATH = fileURLToPath(
  new URL('../../data/sample-students.yaml', import.meta.url),
);

/**
 * Default configuration.
 */
export const DEFAULT_CONFIG: AppConfig = {
  cli: {
    clearScreen: true,
    pauseAfterAction: true,
    confirmDelete: true,
  },
  sampleData: {
    path: DEFAULT_SAMPLE_DATA_PATH,
  },
};
