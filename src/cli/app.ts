/**
 * Application wiring for the interview CLI: configuration, scripts,
 * storage and the engine.
 */

import * as path from 'node:path';
import { loadConfig, resolveConfigPath, type EnvRecord, type LoadedConfig } from '../config/index.js';
import { InterviewEngine } from '../interview/engine.js';
import type { Interview } from '../interview/types.js';
import { ExpressionEnvironment } from '../logic/environment.js';
import { loadScripts } from '../script/loader.js';
import { FileStorage } from '../storage/file.js';
import { MemoryStorage } from '../storage/memory.js';
import type { InterviewStorage } from '../storage/types.js';
import { Logger } from '../utils/logger.js';

/**
 * Options for creating the CLI application.
 */
export interface CliAppOptions {
  /** Explicit configuration file. */
  readonly configPath?: string;
  /** Script files replacing the configured ones, relative to `cwd`. */
  readonly scripts?: readonly string[];
  readonly cwd: string;
  readonly env: EnvRecord;
}

/**
 * A configured application.
 */
export interface CliApp {
  readonly loaded: LoadedConfig;
  readonly logger: Logger;
  /** Script files read, as absolute paths. */
  readonly scriptPaths: readonly string[];
  readonly interviews: ReadonlyMap<string, Interview>;
  readonly engine: InterviewEngine;
}

/**
 * Creates the storage backend a configuration selects. A limit of 0 means
 * none.
 */
export function createStorage(loaded: LoadedConfig): InterviewStorage {
  const { storage } = loaded.config;
  const ttlSeconds = storage.ttl_seconds > 0 ? storage.ttl_seconds : undefined;
  switch (storage.backend) {
    case 'memory':
      return new MemoryStorage({
        ...(ttlSeconds !== undefined && { ttlSeconds }),
        ...(storage.max_entries > 0 && { maxEntries: storage.max_entries }),
      });
    case 'file':
      return new FileStorage({
        directory: resolveConfigPath(loaded, storage.directory),
        ...(ttlSeconds !== undefined && { ttlSeconds }),
      });
  }
}

/**
 * Loads configuration and scripts and creates the engine.
 *
 * @param options - Configuration path, script overrides and environment.
 * @returns The application.
 * @throws ConfigParseError, ConfigValidationError or EnvCoercionError for bad configuration.
 * @throws ConfigurationError for unreadable or malformed scripts.
 */
export async function createCliApp(options: CliAppOptions): Promise<CliApp> {
  const loaded = await loadConfig({
    cwd: options.cwd,
    env: options.env,
    ...(options.configPath !== undefined && { configPath: options.configPath }),
  });
  const { config } = loaded;
  const logger = new Logger({ component: 'cli', debugMode: config.logging.debug });

  const scriptPaths =
    options.scripts !== undefined && options.scripts.length > 0
      ? options.scripts.map((script) => path.resolve(options.cwd, script))
      : config.scripts.paths.map((script) => resolveConfigPath(loaded, script));

  const env = new ExpressionEnvironment({ cacheSize: config.evaluation.cache_size });
  const interviews = await loadScripts(scriptPaths, { env, logger: logger.child('ScriptLoader') });
  const engine = new InterviewEngine({
    interviews,
    storage: createStorage(loaded),
    logger: logger.child('InterviewEngine'),
  });

  logger.debug('cli_ready', {
    configSource: loaded.source,
    scripts: scriptPaths,
    interviews: engine.interviewIds,
  });

  return { loaded, logger, scriptPaths, interviews, engine };
}
