/**
 * Default configuration values for interview.toml.
 *
 * @packageDocumentation
 */

import { DEFAULT_CACHE_SIZE } from '../logic/environment.js';
import type {
  Config,
  EvaluationConfig,
  LoggingConfig,
  ScriptsConfig,
  StorageConfig,
} from './types.js';

/** Name of the configuration file looked up by the CLI. */
export const CONFIG_FILE_NAME = 'interview.toml';

export const DEFAULT_SCRIPTS: ScriptsConfig = {
  paths: ['interviews.yml'],
};

/**
 * States live in memory for a day, at most ten thousand of them.
 */
export const DEFAULT_STORAGE: StorageConfig = {
  backend: 'memory',
  directory: '.interviews/state',
  ttl_seconds: 86400,
  max_entries: 10000,
};

export const DEFAULT_EVALUATION: EvaluationConfig = {
  cache_size: DEFAULT_CACHE_SIZE,
};

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  scripts: DEFAULT_SCRIPTS,
  storage: DEFAULT_STORAGE,
  evaluation: DEFAULT_EVALUATION,
  logging: DEFAULT_LOGGING,
};
