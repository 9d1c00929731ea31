/**
 * Reading and writing nested data through pointers.
 *
 * Writes never mutate their input: `setValue` copies the containers along the
 * path and shares everything else with the original tree.
 *
 * @packageDocumentation
 */

import { PointerError } from '../errors.js';
import { getOwn, isJsonObject, type JsonObject, type JsonValue, type Value } from '../utils/json.js';
import { formatPointer } from './parser.js';
import {
  indexSegment,
  keySegment,
  type PointerPath,
  type PointerSegment,
  type ResolvedSegment,
  type ValuePointer,
} from './types.js';

function describe(value: Value): string {
  if (value === undefined) {
    return 'nothing';
  }
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'a list';
  }
  if (typeof value === 'object') {
    return 'an object';
  }
  return `${typeof value} ${JSON.stringify(value)}`;
}

/**
 * Resolves one segment. Indirect segments are read from the context; the
 * result is undefined when the sub-pointer reads nothing.
 */
function resolveSegment(
  segment: PointerSegment,
  pointer: ValuePointer,
  context: Value
): ResolvedSegment | undefined {
  if (segment.kind !== 'indirect') {
    return segment;
  }
  const value = getValue(segment.pointer, context, context);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return keySegment(value);
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return indexSegment(value);
  }
  throw new PointerError(
    `Indirect segment "${formatPointer(segment.pointer)}" resolved to ${describe(value)}, expected a key or index`,
    formatPointer(pointer)
  );
}

/**
 * Resolves every segment of a pointer, left to right.
 *
 * @param pointer - The pointer to resolve.
 * @param context - Values consulted by indirect segments.
 * @returns The literal segments.
 * @throws PointerError if an indirect segment reads nothing or a non key/index value.
 */
export function resolvePointer(pointer: ValuePointer, context: Value): readonly ResolvedSegment[] {
  return pointer.segments.map((segment) => {
    const resolved = resolveSegment(segment, pointer, context);
    if (resolved === undefined) {
      throw new PointerError(
        segment.kind === 'indirect'
          ? `Indirect segment "${formatPointer(segment.pointer)}" is not defined`
          : 'Segment could not be resolved',
        formatPointer(pointer)
      );
    }
    return resolved;
  });
}

/**
 * Reads the value at a pointer.
 *
 * Missing keys, out-of-range indices and descending into scalars all yield
 * `undefined`.
 *
 * @param pointer - The pointer to read.
 * @param data - The data to read from.
 * @param context - Values consulted by indirect segments; defaults to `data`.
 * @returns The value, or undefined if absent.
 */
export function getValue(pointer: ValuePointer, data: Value, context: Value = data): Value {
  let current: Value = data;
  for (const segment of pointer.segments) {
    const resolved = resolveSegment(segment, pointer, context);
    if (resolved === undefined) {
      return undefined;
    }
    if (resolved.kind === 'key') {
      current = isJsonObject(current) ? getOwn(current, resolved.key) : undefined;
    } else {
      current =
        Array.isArray(current) && resolved.index < current.length
          ? current[resolved.index]
          : undefined;
    }
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}

function setAt(
  container: Value,
  segments: readonly ResolvedSegment[],
  depth: number,
  value: JsonValue,
  pointer: ValuePointer
): JsonValue {
  const segment = segments[depth];
  if (segment === undefined) {
    return value;
  }

  if (segment.kind === 'key') {
    let base: Record<string, JsonValue>;
    if (container === undefined || container === null) {
      base = {};
    } else if (isJsonObject(container)) {
      base = container;
    } else {
      throw new PointerError(
        `Cannot set key "${segment.key}" on ${describe(container)}`,
        formatPointer(pointer)
      );
    }
    return {
      ...base,
      [segment.key]: setAt(getOwn(base, segment.key), segments, depth + 1, value, pointer),
    };
  }

  let list: JsonValue[];
  if (container === undefined || container === null) {
    list = [];
  } else if (Array.isArray(container)) {
    list = container;
  } else {
    throw new PointerError(
      `Cannot set index ${String(segment.index)} on ${describe(container)}`,
      formatPointer(pointer)
    );
  }
  if (segment.index > list.length) {
    throw new PointerError(
      `Index ${String(segment.index)} is beyond the end of a list of length ${String(list.length)}`,
      formatPointer(pointer)
    );
  }
  const copy = list.slice();
  copy[segment.index] = setAt(list[segment.index], segments, depth + 1, value, pointer);
  return copy;
}

/**
 * Writes a value at a pointer, returning a new tree.
 *
 * Missing or null intermediate containers are created: a list when the next
 * segment is an index, an object otherwise. Writing at an index equal to the
 * list length appends.
 *
 * @param pointer - The pointer to write.
 * @param data - The data to write into; not modified.
 * @param value - The value to store.
 * @param context - Values consulted by indirect segments; defaults to `data`.
 * @returns The updated data.
 * @throws PointerError for an index past the end of a list, or a type mismatch along the path.
 *
 * @example
 * ```typescript
 * const next = setValue(parsePointer('item[n][0]'), { item: [1, 2] }, 'x', { n: 2 });
 * // next = { item: [1, 2, ['x']] }
 * ```
 */
export function setValue(
  pointer: ValuePointer,
  data: Value,
  value: JsonValue,
  context: Value = data
): JsonValue {
  const segments = resolvePointer(pointer, context);
  return setAt(data, segments, 0, value, pointer);
}

/**
 * Writes a value into a data object, which must stay an object.
 *
 * @throws PointerError when the pointer would replace the root with a list.
 */
export function setDataValue(
  pointer: ValuePointer,
  data: JsonObject,
  value: JsonValue,
  context: Value = data
): JsonObject {
  const updated = setValue(pointer, data, value, context);
  if (!isJsonObject(updated)) {
    throw new PointerError('The root of the data must stay a mapping', formatPointer(pointer));
  }
  return updated;
}

/**
 * Checks whether a pointer has no indirect segments.
 */
export function isDirectPointer(pointer: ValuePointer): boolean {
  return pointer.segments.every((segment) => segment.kind !== 'indirect');
}

/**
 * Returns the literal path of a direct pointer.
 *
 * @returns The keys and indices, or undefined for an indirect pointer.
 */
export function pointerPath(pointer: ValuePointer): PointerPath | undefined {
  const path: (string | number)[] = [];
  for (const segment of pointer.segments) {
    if (segment.kind === 'indirect') {
      return undefined;
    }
    path.push(segment.kind === 'key' ? segment.key : segment.index);
  }
  return path;
}
