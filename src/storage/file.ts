/**
 * File-backed storage: one JSON file per key.
 *
 * Writes are atomic (temporary file, then rename). Expiry is stored in the
 * record and checked on read.
 *
 * @packageDocumentation
 */

import { StorageError } from '../errors.js';
import {
  ensureDirectory,
  listDirectory,
  readTextFileIfExists,
  removeFile,
  resolveWithin,
  writeFileAtomic,
} from '../utils/safe-fs.js';
import { generateKey, isValidKey } from './keys.js';
import { deserializeRecord, serializeRecord } from './serialization.js';
import type { InterviewStorage, StoredInterview } from './types.js';

const EXTENSION = '.json';

/**
 * Options for FileStorage.
 */
export interface FileStorageOptions {
  /** Directory holding the record files; created on first write. */
  readonly directory: string;
  /** Seconds a record lives; omit for no expiry. */
  readonly ttlSeconds?: number;
  /** Pretty-print the JSON files. */
  readonly pretty?: boolean;
  /** Clock in epoch milliseconds, for tests. */
  readonly now?: () => number;
}

function toStorageError(message: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  return new StorageError(`${message}: ${cause.message}`, 'file_error', cause);
}

export class FileStorage implements InterviewStorage {
  private readonly directory: string;
  private readonly ttlMs: number | undefined;
  private readonly pretty: boolean;
  private readonly now: () => number;

  constructor(options: FileStorageOptions) {
    this.directory = options.directory;
    this.ttlMs = options.ttlSeconds !== undefined ? options.ttlSeconds * 1000 : undefined;
    this.pretty = options.pretty ?? false;
    this.now = options.now ?? Date.now;
  }

  private pathFor(key: string): string {
    if (!isValidKey(key)) {
      throw new StorageError(`Invalid storage key "${key}"`, 'invalid_key');
    }
    return resolveWithin(this.directory, `${key}${EXTENSION}`);
  }

  async put(record: StoredInterview): Promise<string> {
    const key = generateKey();
    const expiresAt = this.ttlMs !== undefined ? this.now() + this.ttlMs : null;
    const filePath = this.pathFor(key);
    try {
      await ensureDirectory(this.directory);
      await writeFileAtomic(filePath, serializeRecord(record, expiresAt, { pretty: this.pretty }));
    } catch (error) {
      throw toStorageError(`Failed to write interview record "${filePath}"`, error);
    }
    return key;
  }

  async get(key: string): Promise<StoredInterview | undefined> {
    const filePath = this.pathFor(key);
    let json: string | undefined;
    try {
      json = await readTextFileIfExists(filePath);
    } catch (error) {
      throw toStorageError(`Failed to read interview record "${filePath}"`, error);
    }
    if (json === undefined) {
      return undefined;
    }
    const envelope = deserializeRecord(json);
    if (envelope.expiresAt !== null && envelope.expiresAt <= this.now()) {
      await removeFile(filePath);
      return undefined;
    }
    return envelope.record;
  }

  /**
   * Deletes expired record files. Files that fail to parse are left alone.
   *
   * @returns The number of files deleted.
   */
  async purgeExpired(): Promise<number> {
    const now = this.now();
    let removed = 0;
    for (const name of await listDirectory(this.directory)) {
      if (!name.endsWith(EXTENSION) || !isValidKey(name.slice(0, -EXTENSION.length))) {
        continue;
      }
      const filePath = resolveWithin(this.directory, name);
      const json = await readTextFileIfExists(filePath);
      if (json === undefined) {
        continue;
      }
      let expiresAt: number | null;
      try {
        expiresAt = deserializeRecord(json).expiresAt;
      } catch (error) {
        if (error instanceof StorageError) {
          continue;
        }
        throw error;
      }
      if (expiresAt !== null && expiresAt <= now) {
        await removeFile(filePath);
        removed += 1;
      }
    }
    return removed;
  }
}
