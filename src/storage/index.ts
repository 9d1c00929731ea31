/**
 * Interview record storage.
 *
 * @packageDocumentation
 */

export type { InterviewStorage, StoredInterview } from './types.js';
export { generateKey, isValidKey, KEY_PATTERN, KEY_BYTES } from './keys.js';
export {
  serializeRecord,
  deserializeRecord,
  type StoredEnvelope,
  type SerializeOptions,
} from './serialization.js';
export { MemoryStorage, type MemoryStorageOptions } from './memory.js';
export { FileStorage, type FileStorageOptions } from './file.js';
