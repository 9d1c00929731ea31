/**
 * Pointer addressing for nested answer data.
 *
 * @packageDocumentation
 */

export * from './types.js';
export { parsePointer, formatPointer } from './parser.js';
export {
  getValue,
  setValue,
  setDataValue,
  resolvePointer,
  isDirectPointer,
  pointerPath,
} from './pointer.js';
