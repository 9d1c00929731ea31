/**
 * Configuration types for interview.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Where interview state is kept between requests.
 */
export type StorageBackend = 'memory' | 'file';

/**
 * Script documents to load at startup.
 */
export interface ScriptsConfig {
  /** Script files, relative to the configuration file. */
  paths: string[];
}

/**
 * Storage settings.
 */
export interface StorageConfig {
  /** Storage backend. */
  backend: StorageBackend;
  /** Directory for the file backend, relative to the configuration file. */
  directory: string;
  /** Seconds a stored state lives; 0 keeps states forever. */
  ttl_seconds: number;
  /** Maximum number of states in the memory backend; 0 for no limit. */
  max_entries: number;
}

/**
 * Expression evaluation settings.
 */
export interface EvaluationConfig {
  /** Capacity of the compiled expression cache. */
  cache_size: number;
}

export interface LoggingConfig {
  /** Whether debug-level entries are written. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from interview.toml.
 */
export interface Config {
  scripts: ScriptsConfig;
  storage: StorageConfig;
  evaluation: EvaluationConfig;
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  scripts?: Partial<ScriptsConfig>;
  storage?: Partial<StorageConfig>;
  evaluation?: Partial<EvaluationConfig>;
  logging?: Partial<LoggingConfig>;
}
