/**
 * Error suggestion system for the interview CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { ConfigurationError, NotFoundError, StorageError, ValidationError } from '../errors.js';
import { CliUsageError } from './utils/args.js';
import { paint, type DisplayOptions } from './utils/displayUtils.js';

/**
 * Error types the CLI can report.
 */
export type ErrorType = 'usage' | 'configuration' | 'script' | 'not_found' | 'storage' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  usage: [
    {
      text: 'Show the usage of the command',
      action: 'interview help <command>',
    },
  ],

  configuration: [
    {
      text: 'Check interview.toml against the documented keys',
      action: 'interview help config',
    },
    {
      text: 'Check INTERVIEW_* environment variables',
      action: 'env | grep INTERVIEW_',
    },
  ],

  script: [
    {
      text: 'Fix the element at the reported location',
    },
    {
      text: 'Check the scripts without running an interview',
      action: 'interview validate',
    },
  ],

  not_found: [
    {
      text: 'List the interviews the scripts define',
      action: 'interview validate',
    },
  ],

  storage: [
    {
      text: 'Check that the storage directory is writable',
    },
    {
      text: 'Switch to in-memory storage',
      action: 'INTERVIEW_STORAGE_BACKEND=memory',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'INTERVIEW_DEBUG=true',
    },
  ],
};

/**
 * Classifies an error by its class.
 *
 * @param error - The error to classify.
 * @returns The identified error type.
 */
export function inferErrorType(error: unknown): ErrorType {
  if (error instanceof CliUsageError) {
    return 'usage';
  }
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'configuration';
  }
  if (error instanceof ConfigurationError) {
    return 'script';
  }
  if (error instanceof NotFoundError) {
    return 'not_found';
  }
  if (error instanceof StorageError) {
    return 'storage';
  }
  return 'unknown';
}

/**
 * Gets suggestions for an error type.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  let result = `  ${String(index)}. ${suggestion.text}`;
  if (suggestion.action !== undefined) {
    result += `\n     ${paint(suggestion.action, 'dim', options)}`;
  }
  return result;
}

/**
 * Formats an error with its details and suggestions.
 *
 * @param error - The error to format.
 * @param options - Display options.
 * @returns The formatted error text.
 */
export function formatErrorWithSuggestions(error: unknown, options: DisplayOptions): string {
  const message = error instanceof Error ? error.message : String(error);
  const suggestions = getSuggestions(inferErrorType(error));

  let result = `${paint('Error:', 'red', options)} ${message}`;

  if (error instanceof ValidationError) {
    for (const detail of error.validationDetails) {
      result += `\n  ${paint(`${detail.field}:`, 'yellow', options)} ${detail.message}`;
    }
  }

  result += `\n\n${paint('Suggestions:', 'bold', options)}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}
