/**
 * Semantic validation for configuration values.
 *
 * Runs after environment overrides are merged, so values that bypassed the
 * TOML parser are checked here too.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ConfigIssue[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ConfigIssue[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation failure.
 */
export interface ConfigIssue {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ConfigIssue[];
}

function checkCount(value: number, field: string, minimum: number, errors: ConfigIssue[]): void {
  if (!Number.isInteger(value) || value < minimum) {
    errors.push({
      field,
      value,
      message: `Must be an integer of at least ${String(minimum)}`,
    });
  }
}

/**
 * Validates a configuration semantically.
 *
 * @param config - The configuration to validate.
 * @returns Validation result with every failure found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ConfigIssue[] = [];

  if (config.scripts.paths.length === 0) {
    errors.push({ field: 'scripts.paths', value: [], message: 'At least one script is required' });
  }
  config.scripts.paths.forEach((scriptPath, index) => {
    if (scriptPath.trim() === '') {
      errors.push({
        field: `scripts.paths[${String(index)}]`,
        value: scriptPath,
        message: 'Script path cannot be empty',
      });
    }
  });

  if (config.storage.backend === 'file' && config.storage.directory.trim() === '') {
    errors.push({
      field: 'storage.directory',
      value: config.storage.directory,
      message: 'The file backend needs a directory',
    });
  }
  checkCount(config.storage.ttl_seconds, 'storage.ttl_seconds', 0, errors);
  checkCount(config.storage.max_entries, 'storage.max_entries', 0, errors);
  checkCount(config.evaluation.cache_size, 'evaluation.cache_size', 1, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
