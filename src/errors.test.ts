import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  EvaluationError,
  InterviewError,
  isUserError,
  NotFoundError,
  PointerSyntaxError,
  StorageError,
  toError,
  ValidationError,
} from './errors.js';

describe('errors', () => {
  it('should prefix configuration errors with their location', () => {
    const error = new ConfigurationError('Unknown key "wen"', 'script.yml#interviews[0].steps[1]');
    expect(error.message).toBe('script.yml#interviews[0].steps[1]: Unknown key "wen"');
    expect(error.code).toBe('CONFIGURATION');
    expect(error).toBeInstanceOf(InterviewError);
  });

  it('should describe where a pointer failed to parse', () => {
    const error = new PointerSyntaxError('Empty segment', 'a..b', 2);
    expect(error.message).toBe('Empty segment at column 2 in "a..b"');
    expect(error.column).toBe(2);
  });

  it('should keep the cause of evaluation and storage errors', () => {
    const cause = new Error('boom');
    expect(new EvaluationError('Division by zero', '1 / 0', cause).cause).toBe(cause);
    const storage = new StorageError('Corrupt record', 'parse_error', cause);
    expect(storage.errorType).toBe('parse_error');
    expect(storage.cause).toBe(cause);
  });

  it('should treat only rejected input and unknown ids as user errors', () => {
    expect(isUserError(new ValidationError('Rejected', [{ field: 'field_0', message: 'Required' }]))).toBe(true);
    expect(isUserError(new NotFoundError('Unknown interview "x"'))).toBe(true);
    expect(isUserError(new ConfigurationError('Broken'))).toBe(false);
    expect(isUserError('text')).toBe(false);
  });

  it('should wrap thrown non-errors', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});
