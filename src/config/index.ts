/**
 * Configuration module for interview.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  EvaluationConfig,
  LoggingConfig,
  PartialConfig,
  ScriptsConfig,
  StorageBackend,
  StorageConfig,
} from './types.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  DEFAULT_EVALUATION,
  DEFAULT_LOGGING,
  DEFAULT_SCRIPTS,
  DEFAULT_STORAGE,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ConfigIssue, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadConfig, resolveConfigPath } from './load.js';
export type { LoadConfigOptions, LoadedConfig } from './load.js';
