/**
 * JSON value types and structural helpers shared by the pointer, logic and
 * interview modules.
 *
 * @packageDocumentation
 */

/**
 * Any value representable in JSON.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/**
 * A JSON object.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A JSON value, or `undefined` for an absent value.
 */
export type Value = JsonValue | undefined;

/**
 * Checks if a value is a plain JSON object (not an array or null).
 *
 * @param value - The value to check.
 * @returns True if the value is a JSON object.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks if an unknown value is made only of JSON-compatible parts.
 *
 * @param value - The value to check.
 * @returns True if the value is a JsonValue.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Deep structural equality over JSON values. `undefined` and `null` are equal.
 *
 * @param a - First value.
 * @param b - Second value.
 * @returns True if the values are structurally equal.
 */
export function deepEqual(a: Value, b: Value): boolean {
  if ((a === undefined || a === null) && (b === undefined || b === null)) {
    return true;
  }
  if (a === undefined || a === null || b === undefined || b === null) {
    return false;
  }
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => deepEqual(item, b[index]));
  }
  if (isJsonObject(a)) {
    if (!isJsonObject(b)) {
      return false;
    }
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) {
      return false;
    }
    return aKeys.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
  }
  return a === b;
}

/**
 * Reads an own property of a JSON object without touching the prototype chain.
 *
 * @param obj - The object to read from.
 * @param key - The property name.
 * @returns The property value, or undefined if not an own property.
 */
export function getOwn(obj: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(obj, key) ? obj[key] : undefined;
}
