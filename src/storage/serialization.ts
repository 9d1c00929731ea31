/**
 * JSON serialization of stored interview records.
 *
 * Records are validated field by field on the way back in, so a corrupt or
 * hand-edited record fails with a StorageError instead of reaching the
 * update algorithm.
 *
 * @packageDocumentation
 */

import { StorageError } from '../errors.js';
import type { InterviewState } from '../interview/types.js';
import { isJsonObject, isJsonValue, type JsonObject } from '../utils/json.js';
import type { StoredInterview } from './types.js';

/**
 * A record as written to storage.
 */
export interface StoredEnvelope {
  readonly record: StoredInterview;
  /** Epoch milliseconds after which the record is gone, or null for never. */
  readonly expiresAt: number | null;
}

/**
 * Options for serializing a record.
 */
export interface SerializeOptions {
  /** Pretty-print the JSON with indentation. Default is false. */
  pretty?: boolean;
}

/**
 * Serializes a record and its expiry to JSON.
 */
export function serializeRecord(
  record: StoredInterview,
  expiresAt: number | null,
  options: SerializeOptions = {}
): string {
  const envelope = { interviewId: record.interviewId, expiresAt, state: record.state };
  return options.pretty === true ? JSON.stringify(envelope, null, 2) : JSON.stringify(envelope);
}

function schemaError(message: string): StorageError {
  return new StorageError(`Invalid stored interview: ${message}`, 'schema_error');
}

function requireObject(value: unknown, field: string): JsonObject {
  if (!isJsonObject(value) || !isJsonValue(value)) {
    throw schemaError(`${field} must be an object`);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw schemaError(`${field} must be a string`);
  }
  return value;
}

function requireNullableString(value: unknown, field: string): string | null {
  if (value !== null && typeof value !== 'string') {
    throw schemaError(`${field} must be a string or null`);
  }
  return value;
}

function requireStringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw schemaError(`${field} must be an array`);
  }
  return value.map((item: unknown, index) => requireString(item, `${field}[${String(index)}]`));
}

function validateState(value: unknown): InterviewState {
  const raw = requireObject(value, 'state');
  const answeredQuestionIds = requireStringList(raw.answeredQuestionIds, 'state.answeredQuestionIds');
  if (new Set(answeredQuestionIds).size !== answeredQuestionIds.length) {
    throw schemaError('state.answeredQuestionIds must not contain duplicates');
  }
  const currentQuestionId = requireNullableString(raw.currentQuestionId, 'state.currentQuestionId');
  if (currentQuestionId !== null && answeredQuestionIds.includes(currentQuestionId)) {
    throw schemaError(`state.currentQuestionId "${currentQuestionId}" is already answered`);
  }
  if (typeof raw.completed !== 'boolean') {
    throw schemaError('state.completed must be a boolean');
  }
  return {
    version: requireString(raw.version, 'state.version'),
    data: requireObject(raw.data, 'state.data'),
    context: requireObject(raw.context, 'state.context'),
    answeredQuestionIds,
    currentQuestionId,
    target: requireNullableString(raw.target, 'state.target'),
    completed: raw.completed,
  };
}

/**
 * Parses and validates a serialized record.
 *
 * @param json - Text produced by serializeRecord.
 * @returns The record and its expiry.
 * @throws StorageError with errorType `parse_error` for invalid JSON, `schema_error` for a wrong shape.
 */
export function deserializeRecord(json: string): StoredEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new StorageError(`Stored interview is not valid JSON: ${cause.message}`, 'parse_error', cause);
  }

  const raw = requireObject(parsed, 'record');
  const expiresAt = raw.expiresAt;
  if (expiresAt !== null && typeof expiresAt !== 'number') {
    throw schemaError('expiresAt must be a number or null');
  }
  return {
    record: {
      interviewId: requireString(raw.interviewId, 'interviewId'),
      state: validateState(raw.state),
    },
    expiresAt,
  };
}
