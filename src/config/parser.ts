/**
 * TOML configuration parser for interview.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_EVALUATION,
  DEFAULT_LOGGING,
  DEFAULT_SCRIPTS,
  DEFAULT_STORAGE,
} from './defaults.js';
import type {
  Config,
  EvaluationConfig,
  LoggingConfig,
  ScriptsConfig,
  StorageBackend,
  StorageConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Record<string, unknown>;

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value === null ? 'null' : typeof value;
}

/**
 * Validates that a value is a TOML table.
 *
 * @throws ConfigParseError if value is not a table.
 */
function validateTable(value: unknown, fieldPath: string): Table | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value) || value instanceof Date) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return { ...value };
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a non-negative integer.
 *
 * @throws ConfigParseError if value is not a number, or not a non-negative integer.
 */
function validateCount(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be a non-negative integer, got ${String(value)}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function validateStringList(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array, got ${describeType(value)}`
    );
  }
  return value.map((item: unknown, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

const STORAGE_BACKENDS: readonly StorageBackend[] = ['memory', 'file'];

function validateBackend(value: unknown, fieldPath: string): StorageBackend {
  const text = validateString(value, fieldPath);
  const backend = STORAGE_BACKENDS.find((candidate) => candidate === text);
  if (backend === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${STORAGE_BACKENDS.join(', ')}, got '${text}'`
    );
  }
  return backend;
}

function parseScripts(raw: Table | undefined): ScriptsConfig {
  const result: ScriptsConfig = { paths: [...DEFAULT_SCRIPTS.paths] };
  if (raw === undefined) {
    return result;
  }
  if ('paths' in raw) {
    result.paths = validateStringList(raw.paths, 'scripts.paths');
  }
  return result;
}

function parseStorage(raw: Table | undefined): StorageConfig {
  const result: StorageConfig = { ...DEFAULT_STORAGE };
  if (raw === undefined) {
    return result;
  }
  if ('backend' in raw) {
    result.backend = validateBackend(raw.backend, 'storage.backend');
  }
  if ('directory' in raw) {
    result.directory = validateString(raw.directory, 'storage.directory');
  }
  if ('ttl_seconds' in raw) {
    result.ttl_seconds = validateCount(raw.ttl_seconds, 'storage.ttl_seconds');
  }
  if ('max_entries' in raw) {
    result.max_entries = validateCount(raw.max_entries, 'storage.max_entries');
  }
  return result;
}

function parseEvaluation(raw: Table | undefined): EvaluationConfig {
  const result: EvaluationConfig = { ...DEFAULT_EVALUATION };
  if (raw !== undefined && 'cache_size' in raw) {
    result.cache_size = validateCount(raw.cache_size, 'evaluation.cache_size');
  }
  return result;
}

function parseLogging(raw: Table | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * Unknown sections and keys are ignored. Ranges that depend on more than one
 * field are checked by `validateConfig`.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [storage]
 * backend = "file"
 * directory = "var/interviews"
 * `);
 * console.log(config.storage.ttl_seconds); // 86400
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    scripts: parseScripts(validateTable(parsed.scripts, 'scripts')),
    storage: parseStorage(validateTable(parsed.storage, 'storage')),
    evaluation: parseEvaluation(validateTable(parsed.evaluation, 'evaluation')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}
