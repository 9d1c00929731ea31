/**
 * Loading interview.toml from disk.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { readTextFileIfExists } from '../utils/safe-fs.js';
import { CONFIG_FILE_NAME } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { ConfigParseError, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Options for loadConfig.
 */
export interface LoadConfigOptions {
  /** Explicit configuration file; it must exist. */
  readonly configPath?: string;
  /** Directory searched for interview.toml when no path is given. */
  readonly cwd?: string;
  /** Environment for overrides (defaults to process.env). */
  readonly env?: EnvRecord;
}

/**
 * A loaded configuration and where relative paths in it are anchored.
 */
export interface LoadedConfig {
  readonly config: Config;
  /** The file read, or null when defaults were used. */
  readonly source: string | null;
  /** Directory of the file read, or the working directory. */
  readonly baseDirectory: string;
}

/**
 * Reads, parses and validates the configuration.
 *
 * Without an explicit path, a missing interview.toml in `cwd` means
 * defaults. Environment overrides apply in both cases.
 *
 * @throws ConfigParseError when the file is missing or malformed.
 * @throws EnvCoercionError when an override cannot be coerced.
 * @throws ConfigValidationError when the merged values are out of range.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const filePath = path.resolve(cwd, options.configPath ?? CONFIG_FILE_NAME);
  const content = await readTextFileIfExists(filePath);

  if (content === undefined && options.configPath !== undefined) {
    throw new ConfigParseError(`Configuration file not found: ${filePath}`);
  }

  const parsed = content !== undefined ? parseConfig(content) : parseConfig('');
  const config = applyEnvOverrides(parsed, options.env ?? process.env);
  assertConfigValid(config);

  return {
    config,
    source: content !== undefined ? filePath : null,
    baseDirectory: content !== undefined ? path.dirname(filePath) : cwd,
  };
}

/**
 * Resolves a configured path against the configuration's directory.
 */
export function resolveConfigPath(loaded: LoadedConfig, configured: string): string {
  return path.resolve(loaded.baseDirectory, configured);
}
