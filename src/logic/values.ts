/**
 * Value semantics shared by the evaluator, filters and templates.
 *
 * @packageDocumentation
 */

import { isJsonObject, type Value } from '../utils/json.js';

/**
 * Raised while evaluating a node. The compiled expression that owns the node
 * rethrows it as an EvaluationError carrying its source text.
 */
export class EvaluationFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationFailure';
  }
}

/**
 * Truthiness: absent, null, false, 0, NaN, '' and empty lists or mappings are false.
 *
 * @param value - The value to test.
 * @returns Whether the value counts as true.
 */
export function isTruthy(value: Value): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isJsonObject(value)) {
    return Object.keys(value).length > 0;
  }
  if (typeof value === 'number') {
    return value !== 0 && !Number.isNaN(value);
  }
  if (typeof value === 'string') {
    return value.length > 0;
  }
  return value;
}

/**
 * Converts a value to the text a template renders for it.
 *
 * Absent and null values render as the empty string; lists and mappings as JSON.
 */
export function toText(value: Value): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Names a value's type for error messages.
 */
export function typeName(value: Value): string {
  if (value === undefined) {
    return 'undefined';
  }
  if (value === null) {
    return 'none';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  if (isJsonObject(value)) {
    return 'mapping';
  }
  return typeof value;
}
