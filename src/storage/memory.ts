/**
 * In-process storage with expiry and a size bound.
 *
 * @packageDocumentation
 */

import { generateKey } from './keys.js';
import { deserializeRecord, serializeRecord } from './serialization.js';
import type { InterviewStorage, StoredInterview } from './types.js';

/**
 * Options for MemoryStorage.
 */
export interface MemoryStorageOptions {
  /** Seconds a record lives; omitted or 0 for no expiry. */
  readonly ttlSeconds?: number;
  /** Maximum number of records, the oldest dropped first; omitted or 0 for no limit. */
  readonly maxEntries?: number;
  /** Clock in epoch milliseconds, for tests. */
  readonly now?: () => number;
}

interface Entry {
  readonly json: string;
  readonly expiresAt: number | null;
}

/**
 * Stores serialized records in a Map.
 *
 * Records are stored as JSON text so that callers can never alias stored
 * state, and reads go through the same validation as the file store.
 */
export class MemoryStorage implements InterviewStorage {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number | undefined;
  private readonly maxEntries: number | undefined;
  private readonly now: () => number;

  constructor(options: MemoryStorageOptions = {}) {
    const { ttlSeconds, maxEntries } = options;
    this.ttlMs = ttlSeconds !== undefined && ttlSeconds > 0 ? ttlSeconds * 1000 : undefined;
    this.maxEntries = maxEntries !== undefined && maxEntries > 0 ? maxEntries : undefined;
    this.now = options.now ?? Date.now;
  }

  put(record: StoredInterview): Promise<string> {
    this.purgeExpired();
    if (this.maxEntries !== undefined) {
      while (this.entries.size >= this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done === true) {
          break;
        }
        this.entries.delete(oldest.value);
      }
    }
    const key = generateKey();
    const expiresAt = this.ttlMs !== undefined ? this.now() + this.ttlMs : null;
    this.entries.set(key, { json: serializeRecord(record, expiresAt), expiresAt });
    return Promise.resolve(key);
  }

  get(key: string): Promise<StoredInterview | undefined> {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      return Promise.resolve(undefined);
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return Promise.resolve(undefined);
    }
    try {
      return Promise.resolve(deserializeRecord(entry.json).record);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  /**
   * Drops expired records.
   *
   * Every record gets the same ttl, so insertion order is expiry order and
   * the scan stops at the first live record.
   *
   * @returns The number of records dropped.
   */
  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt === null || entry.expiresAt > now) {
        break;
      }
      this.entries.delete(key);
      removed += 1;
    }
    return removed;
  }

  /** The number of records held, expired ones included. */
  get size(): number {
    return this.entries.size;
  }
}
