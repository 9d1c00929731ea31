/**
 * Value pointer types.
 *
 * A pointer addresses a location in nested answer data, e.g.
 * `registration.first_name`, `items[0]` or `item[n][0]` where `n` is read from
 * the evaluation context.
 *
 * @packageDocumentation
 */

/**
 * A literal object key.
 */
export interface KeySegment {
  readonly kind: 'key';
  readonly key: string;
}

/**
 * A literal list index.
 */
export interface IndexSegment {
  readonly kind: 'index';
  readonly index: number;
}

/**
 * A nested pointer whose value, read from the context, becomes a key or index.
 */
export interface IndirectSegment {
  readonly kind: 'indirect';
  readonly pointer: ValuePointer;
}

/**
 * One step of a pointer.
 */
export type PointerSegment = KeySegment | IndexSegment | IndirectSegment;

/**
 * A parsed pointer.
 */
export interface ValuePointer {
  readonly segments: readonly PointerSegment[];
}

/**
 * A segment after indirect resolution.
 */
export type ResolvedSegment = KeySegment | IndexSegment;

/**
 * The literal path of a direct pointer.
 */
export type PointerPath = readonly (string | number)[];

/**
 * Pattern for keys that need no quoting.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Creates a key segment.
 */
export function keySegment(key: string): KeySegment {
  return { kind: 'key', key };
}

/**
 * Creates an index segment.
 */
export function indexSegment(index: number): IndexSegment {
  return { kind: 'index', index };
}

/**
 * Creates an indirect segment.
 */
export function indirectSegment(pointer: ValuePointer): IndirectSegment {
  return { kind: 'indirect', pointer };
}

/**
 * Creates a pointer from segments.
 */
export function createPointer(segments: readonly PointerSegment[]): ValuePointer {
  return { segments };
}
