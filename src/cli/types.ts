/**
 * CLI types and interfaces for the interview CLI.
 */

import type { EnvRecord } from '../config/index.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Interface for reading user input.
 * Abstracted for testability.
 */
export interface InputReader {
  /**
   * Reads a line of input.
   *
   * @throws Error when the input ends before a line is read.
   */
  readLine(prompt: string): Promise<string>;
  /** Close the reader. */
  close(): void;
}

/**
 * Interface for writing output lines.
 */
export interface OutputWriter {
  /** Writes one line to standard output. */
  line(text?: string): void;
  /** Writes one line to standard error. */
  error(text?: string): void;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments after the command name.
   */
  args: string[];

  /**
   * Directory relative paths are resolved against.
   */
  cwd: string;

  /**
   * Environment variables, for configuration overrides.
   */
  env: EnvRecord;

  input: InputReader;

  output: OutputWriter;

  display: DisplayOptions;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
