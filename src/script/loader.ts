/**
 * Loading script documents from YAML, JSON or TOML files.
 *
 * A document is `{ interviews: [...] }`. An interview entry, or a question
 * entry inside one, may be a path to a file holding it; paths are resolved
 * against the directory of the including file.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import * as yaml from 'js-yaml';
import { ConfigurationError } from '../errors.js';
import type { Interview } from '../interview/types.js';
import { ExpressionEnvironment } from '../logic/environment.js';
import { Logger } from '../utils/logger.js';
import { readTextFileIfExists } from '../utils/safe-fs.js';
import { findScriptWarnings, requireDocument, structureInterview } from './structure.js';

/**
 * Options for loading scripts.
 */
export interface LoadScriptOptions {
  /** Environment compiling expressions; shared with the engine run. */
  readonly env?: ExpressionEnvironment;
  readonly logger?: Logger;
}

type DocumentFormat = 'yaml' | 'json' | 'toml';

function formatOf(filePath: string): DocumentFormat {
  const extension = path.extname(filePath).toLowerCase();
  switch (extension) {
    case '.yml':
    case '.yaml':
      return 'yaml';
    case '.json':
      return 'json';
    case '.toml':
      return 'toml';
    default:
      throw new ConfigurationError(
        `Unsupported script extension "${extension}"; use .yml, .yaml, .json or .toml`,
        filePath
      );
  }
}

/**
 * Replaces dates (YAML timestamps, TOML dates) with ISO text.
 * A date at midnight UTC becomes `YYYY-MM-DD`.
 */
function normalizeDates(value: unknown): unknown {
  if (value instanceof Date) {
    const iso = value.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  }
  if (Array.isArray(value)) {
    return value.map(normalizeDates);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]: [string, unknown]) => [key, normalizeDates(item)])
    );
  }
  return value;
}

function parseText(text: string, format: DocumentFormat): unknown {
  switch (format) {
    case 'yaml':
      return yaml.load(text);
    case 'json':
      return JSON.parse(text);
    case 'toml':
      return TOML.parse(text);
  }
}

/**
 * Reads and parses one document, choosing the parser by file extension.
 *
 * @throws ConfigurationError when the file is missing, has an unknown extension or does not parse.
 */
export async function readScriptFile(filePath: string): Promise<unknown> {
  const format = formatOf(filePath);
  const text = await readTextFileIfExists(filePath);
  if (text === undefined) {
    throw new ConfigurationError('Script file not found', filePath);
  }
  try {
    return normalizeDates(parseText(text, format));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigurationError(
      `Invalid ${format.toUpperCase()}: ${cause.message}`,
      filePath,
      cause
    );
  }
}

/**
 * Replaces a path entry by the parsed content of the file it names.
 */
async function resolveEntry(entry: unknown, baseDirectory: string): Promise<unknown> {
  if (typeof entry !== 'string') {
    return entry;
  }
  return readScriptFile(path.resolve(baseDirectory, entry));
}

/**
 * Resolves question includes. An included file holds one question or a list.
 */
async function resolveQuestions(questions: unknown, baseDirectory: string): Promise<unknown> {
  if (!Array.isArray(questions)) {
    return questions;
  }
  const resolved: unknown[] = [];
  for (const entry of questions) {
    const content = await resolveEntry(entry, baseDirectory);
    if (typeof entry === 'string' && Array.isArray(content)) {
      resolved.push(...content);
    } else {
      resolved.push(content);
    }
  }
  return resolved;
}

async function resolveInterview(
  entry: unknown,
  baseDirectory: string
): Promise<{ value: unknown; baseDirectory: string }> {
  const includeDirectory =
    typeof entry === 'string' ? path.dirname(path.resolve(baseDirectory, entry)) : baseDirectory;
  const value = await resolveEntry(entry, baseDirectory);
  if (typeof value !== 'object' || value === null || Array.isArray(value) || !('questions' in value)) {
    return { value, baseDirectory: includeDirectory };
  }
  return {
    value: { ...value, questions: await resolveQuestions(value.questions, includeDirectory) },
    baseDirectory: includeDirectory,
  };
}

/**
 * Loads every interview of a script document.
 *
 * Unknown question references only log a warning: they fail when the step
 * runs, which a guard may prevent.
 *
 * @param filePath - The script document.
 * @param options - Environment and logger.
 * @returns The interviews in document order.
 * @throws ConfigurationError for unreadable files or malformed elements.
 */
export async function loadScript(
  filePath: string,
  options: LoadScriptOptions = {}
): Promise<Interview[]> {
  const env = options.env ?? new ExpressionEnvironment();
  const logger = options.logger ?? new Logger({ component: 'ScriptLoader' });
  const absolutePath = path.resolve(filePath);
  const baseDirectory = path.dirname(absolutePath);

  const document = requireDocument(await readScriptFile(absolutePath), absolutePath);
  const entries = document.interviews ?? [];
  if (!Array.isArray(entries)) {
    throw new ConfigurationError('"interviews" must be a list', `${absolutePath}#interviews`);
  }

  const interviews: Interview[] = [];
  for (const [index, entry] of entries.entries()) {
    const location = `${absolutePath}#interviews[${String(index)}]`;
    const resolved = await resolveInterview(entry, baseDirectory);
    const interview = structureInterview(resolved.value, location, env);
    for (const warning of findScriptWarnings(interview, location)) {
      logger.warn('script_warning', { location: warning.location, message: warning.message });
    }
    interviews.push(interview);
  }

  logger.debug('script_loaded', {
    path: absolutePath,
    interviews: interviews.map((interview) => interview.id),
  });
  return interviews;
}

/**
 * Loads several script documents into one registry.
 *
 * @throws ConfigurationError when two documents define the same interview id.
 */
export async function loadScripts(
  filePaths: readonly string[],
  options: LoadScriptOptions = {}
): Promise<Map<string, Interview>> {
  const registry = new Map<string, Interview>();
  for (const filePath of filePaths) {
    for (const interview of await loadScript(filePath, options)) {
      if (registry.has(interview.id)) {
        throw new ConfigurationError(`Duplicate interview id "${interview.id}"`, path.resolve(filePath));
      }
      registry.set(interview.id, interview);
    }
  }
  return registry;
}
