/**
 * Error taxonomy for the interview engine.
 *
 * Configuration, evaluation and pointer errors are defects in the script and
 * abort an update with nothing persisted. Validation and not-found errors are
 * caused by the caller and can be shown to the end user.
 *
 * @packageDocumentation
 */

/**
 * Error codes for programmatic handling.
 */
export type InterviewErrorCode =
  | 'POINTER_SYNTAX'
  | 'POINTER'
  | 'EVALUATION'
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'STORAGE';

/**
 * Base class for all interview engine errors.
 */
export class InterviewError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: InterviewErrorCode;
  /** The underlying cause if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new InterviewError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, code: InterviewErrorCode, cause?: Error) {
    super(message);
    this.name = 'InterviewError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * A path expression could not be parsed.
 */
export class PointerSyntaxError extends InterviewError {
  /** The text that failed to parse. */
  public readonly source: string;
  /** Zero-based column where parsing failed. */
  public readonly column: number;

  constructor(message: string, source: string, column: number) {
    super(`${message} at column ${String(column)} in "${source}"`, 'POINTER_SYNTAX');
    this.name = 'PointerSyntaxError';
    this.source = source;
    this.column = column;
  }
}

/**
 * A pointer could not be resolved or written, e.g. an index past the end of a list.
 */
export class PointerError extends InterviewError {
  /** Canonical form of the pointer involved. */
  public readonly pointer: string;

  constructor(message: string, pointer: string) {
    super(`${message} (pointer "${pointer}")`, 'POINTER');
    this.name = 'PointerError';
    this.pointer = pointer;
  }
}

/**
 * An expression or template performed an undefined operation.
 */
export class EvaluationError extends InterviewError {
  /** Source text of the expression, when known. */
  public readonly source: string | undefined;

  constructor(message: string, source?: string, cause?: Error) {
    super(source !== undefined ? `${message} in "${source}"` : message, 'EVALUATION', cause);
    this.name = 'EvaluationError';
    this.source = source;
  }
}

/**
 * The interview script is malformed or refers to something that does not exist.
 */
export class ConfigurationError extends InterviewError {
  /** Location in the script document, e.g. `interviews[0].steps[2]`. */
  public readonly location: string | undefined;

  constructor(message: string, location?: string, cause?: Error) {
    super(location !== undefined ? `${location}: ${message}` : message, 'CONFIGURATION', cause);
    this.name = 'ConfigurationError';
    this.location = location;
  }
}

/**
 * Validation detail for a single field.
 */
export interface ValidationDetail {
  /** The synthetic field name (or `responses` for the whole payload). */
  readonly field: string;
  /** Description of the validation error. */
  readonly message: string;
  /** The value received, when safe to include. */
  readonly received?: unknown;
}

/**
 * Responses were rejected, or supplied inconsistently with the pending question.
 */
export class ValidationError extends InterviewError {
  /** Detailed validation errors. */
  public readonly validationDetails: readonly ValidationDetail[];

  constructor(message: string, validationDetails: readonly ValidationDetail[] = []) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
    this.validationDetails = validationDetails;
  }
}

/**
 * An interview id or stored state key does not exist.
 */
export class NotFoundError extends InterviewError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Kinds of storage failure.
 */
export type StorageErrorType = 'parse_error' | 'schema_error' | 'file_error' | 'invalid_key';

/**
 * A stored interview could not be written or read back.
 */
export class StorageError extends InterviewError {
  /** The kind of storage failure. */
  public readonly errorType: StorageErrorType;

  constructor(message: string, errorType: StorageErrorType, cause?: Error) {
    super(message, 'STORAGE', cause);
    this.name = 'StorageError';
    this.errorType = errorType;
  }
}

/**
 * Checks whether an error is caused by the caller rather than by the script or system.
 *
 * @param error - The error to classify.
 * @returns True for validation and not-found errors.
 */
export function isUserError(error: unknown): error is ValidationError | NotFoundError {
  return error instanceof ValidationError || error instanceof NotFoundError;
}

/**
 * Normalizes an unknown thrown value to an Error.
 *
 * @param error - The thrown value.
 * @returns The value itself if it is an Error, otherwise a wrapping Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
