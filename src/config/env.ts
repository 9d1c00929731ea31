/**
 * `INTERVIEW_*` environment overrides.
 *
 * Precedence: environment, then the configuration file, then defaults.
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig, StorageBackend } from './types.js';

/** Environment variables as `process.env` holds them. */
export type EnvRecord = Record<string, string | undefined>;

/**
 * An `INTERVIEW_*` value that does not fit its setting.
 */
export class EnvCoercionError extends Error {
  constructor(
    public readonly envVar: string,
    public readonly rawValue: string,
    public readonly expectedType: string,
    message = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
  ) {
    super(message);
    this.name = 'EnvCoercionError';
  }
}

function coerceToNumber(value: string, envVar: string): number {
  const text = value.trim();
  if (text === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }
  const parsed = Number(text);
  if (Number.isNaN(parsed)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }
  return parsed;
}

/**
 * Looks a value up, case-insensitively, among fixed spellings.
 *
 * @param described - How the expected type reads in the message, e.g. "a storage backend".
 */
function coerceToChoice<T>(
  value: string,
  envVar: string,
  expectedType: string,
  described: string,
  choices: ReadonlyMap<string, T>
): T {
  const choice = choices.get(value.trim().toLowerCase());
  if (choice === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      expectedType,
      `Cannot coerce '${envVar}' value '${value}' to ${described}. Expected one of: ${[...choices.keys()].join(', ')}`
    );
  }
  return choice;
}

const BOOLEAN_SPELLINGS = new Map<string, boolean>([
  ['true', true],
  ['1', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['0', false],
  ['no', false],
  ['off', false],
]);

const BACKENDS = new Map<string, StorageBackend>([
  ['memory', 'memory'],
  ['file', 'file'],
]);

function coerceToBoolean(value: string, envVar: string): boolean {
  return coerceToChoice(value, envVar, 'boolean', 'boolean', BOOLEAN_SPELLINGS);
}

function coerceToBackend(value: string, envVar: string): StorageBackend {
  return coerceToChoice(value, envVar, 'storage backend', 'a storage backend', BACKENDS);
}

/** Comma-separated items; empty items are dropped. */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

interface EnvMapping {
  readonly type: 'string' | 'number' | 'boolean' | 'list' | 'backend';
  readonly description: string;
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: INTERVIEW_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * INTERVIEW_SCRIPT and INTERVIEW_DEBUG are shortcuts.
 */
const ENV_VAR_MAPPINGS: Record<string, EnvMapping> = {
  INTERVIEW_SCRIPT: {
    type: 'string',
    description: 'Load this single script (shortcut for INTERVIEW_SCRIPTS_PATHS)',
    apply: (overrides, value) => {
      overrides.scripts = { ...overrides.scripts, paths: [value.trim()] };
    },
  },
  INTERVIEW_SCRIPTS_PATHS: {
    type: 'list',
    description: 'Comma-separated script paths',
    apply: (overrides, value) => {
      overrides.scripts = { ...overrides.scripts, paths: coerceToList(value) };
    },
  },
  INTERVIEW_STORAGE_BACKEND: {
    type: 'backend',
    description: 'Storage backend (memory, file)',
    apply: (overrides, value, envVar) => {
      overrides.storage = { ...overrides.storage, backend: coerceToBackend(value, envVar) };
    },
  },
  INTERVIEW_STORAGE_DIRECTORY: {
    type: 'string',
    description: 'Directory of the file storage backend',
    apply: (overrides, value) => {
      overrides.storage = { ...overrides.storage, directory: value };
    },
  },
  INTERVIEW_STORAGE_TTL_SECONDS: {
    type: 'number',
    description: 'Seconds a stored state lives (0 keeps states forever)',
    apply: (overrides, value, envVar) => {
      overrides.storage = { ...overrides.storage, ttl_seconds: coerceToNumber(value, envVar) };
    },
  },
  INTERVIEW_STORAGE_MAX_ENTRIES: {
    type: 'number',
    description: 'Maximum states held by the memory backend (0 for no limit)',
    apply: (overrides, value, envVar) => {
      overrides.storage = { ...overrides.storage, max_entries: coerceToNumber(value, envVar) };
    },
  },
  INTERVIEW_EVALUATION_CACHE_SIZE: {
    type: 'number',
    description: 'Capacity of the compiled expression cache',
    apply: (overrides, value, envVar) => {
      overrides.evaluation = { ...overrides.evaluation, cache_size: coerceToNumber(value, envVar) };
    },
  },
  INTERVIEW_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging (shortcut for INTERVIEW_LOGGING_DEBUG)',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
  INTERVIEW_LOGGING_DEBUG: {
    type: 'boolean',
    description: 'Enable debug logging',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
    },
  },
};

export interface EnvOverrideResult {
  overrides: PartialConfig;
  /** Variables that were set and applied, in table order. */
  appliedVars: string[];
  /** Coercion failures, filled only with `collectErrors`. */
  errors: EnvCoercionError[];
}

/**
 * Reads the `INTERVIEW_*` variables into a partial configuration.
 *
 * Variables are applied in table order, so a full name wins over its
 * shortcut when both are set. Empty variables count as unset.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ INTERVIEW_STORAGE_BACKEND: 'file' });
 * overrides.storage?.backend; // 'file'
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const result: EnvOverrideResult = { overrides: {}, appliedVars: [], errors: [] };

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    try {
      mapping.apply(result.overrides, value, envVar);
      result.appliedVars.push(envVar);
    } catch (error) {
      if (!(error instanceof EnvCoercionError) || options.collectErrors !== true) {
        throw error;
      }
      result.errors.push(error);
    }
  }

  return result;
}

/**
 * Layers environment overrides over a configuration, section by section.
 *
 * @throws EnvCoercionError for the first variable that cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return {
    scripts: { ...config.scripts, ...overrides.scripts },
    storage: { ...config.storage, ...overrides.storage },
    evaluation: { ...config.evaluation, ...overrides.evaluation },
    logging: { ...config.logging, ...overrides.logging },
  };
}

/** Description and value type of every supported variable, for help output. */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return Object.fromEntries(
    Object.entries(ENV_VAR_MAPPINGS).map(([envVar, { description, type }]) => [
      envVar,
      { description, type },
    ])
  );
}
