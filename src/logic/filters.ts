/**
 * Built-in filters, applied as `value | name(args)`.
 *
 * @packageDocumentation
 */

import { isJsonObject, type Value } from '../utils/json.js';
import { EvaluationFailure, isTruthy, toText, typeName } from './values.js';

/**
 * A filter receives the piped value and its evaluated arguments.
 */
export type FilterFunction = (value: Value, args: readonly Value[]) => Value;

function requireString(name: string, value: Value): string {
  if (typeof value !== 'string') {
    throw new EvaluationFailure(`Filter "${name}" expects a string, got ${typeName(value)}`);
  }
  return value;
}

function requireNumber(name: string, value: Value): number {
  if (typeof value !== 'number') {
    throw new EvaluationFailure(`Filter "${name}" expects a number, got ${typeName(value)}`);
  }
  return value;
}

function toNumber(value: Value, fallback: Value, integer: boolean): Value {
  if (typeof value === 'number') {
    return integer ? Math.trunc(value) : value;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const pattern = integer ? /^[+-]?\d+$/ : /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
    if (pattern.test(trimmed)) {
      return Number(trimmed);
    }
  }
  return fallback ?? 0;
}

/**
 * Filters available to every expression.
 */
export const BUILTIN_FILTERS: Readonly<Record<string, FilterFunction>> = {
  default: (value, [fallback, boolean]) => {
    const missing = isTruthy(boolean) ? !isTruthy(value) : value === undefined;
    return missing ? (fallback ?? '') : value;
  },

  length: (value) => {
    if (typeof value === 'string' || Array.isArray(value)) {
      return value.length;
    }
    if (isJsonObject(value)) {
      return Object.keys(value).length;
    }
    throw new EvaluationFailure(`Filter "length" cannot measure ${typeName(value)}`);
  },

  lower: (value) => requireString('lower', value).toLowerCase(),
  upper: (value) => requireString('upper', value).toUpperCase(),
  trim: (value) => requireString('trim', value).trim(),

  join: (value, [separator]) => {
    if (!Array.isArray(value)) {
      throw new EvaluationFailure(`Filter "join" expects a list, got ${typeName(value)}`);
    }
    return value.map(toText).join(toText(separator));
  },

  int: (value, [fallback]) => toNumber(value, fallback, true),
  float: (value, [fallback]) => toNumber(value, fallback, false),
  string: (value) => toText(value),

  first: (value) => {
    if (typeof value === 'string' || Array.isArray(value)) {
      return value[0];
    }
    throw new EvaluationFailure(`Filter "first" expects a list or string, got ${typeName(value)}`);
  },

  last: (value) => {
    if (typeof value === 'string' || Array.isArray(value)) {
      return value[value.length - 1];
    }
    throw new EvaluationFailure(`Filter "last" expects a list or string, got ${typeName(value)}`);
  },

  abs: (value) => Math.abs(requireNumber('abs', value)),
};
