/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import { formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: returns the result's exit code, writing its message if any
 * - On error: writes the error with suggestions and returns 1
 *
 * @param context - Output and display options for error reporting.
 * @param fn - The function to wrap (sync or async).
 * @returns The exit code.
 */
export async function withErrorHandling(
  context: Pick<CliContext, 'output' | 'display'>,
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    if (result.message !== undefined) {
      context.output.line(result.message);
    }
    return result.exitCode;
  } catch (error) {
    context.output.error(formatErrorWithSuggestions(error, context.display));
    return 1;
  }
}
