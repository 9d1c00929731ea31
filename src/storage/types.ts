/**
 * Storage contract for interview state.
 *
 * @packageDocumentation
 */

import type { InterviewState } from '../interview/types.js';

/**
 * A stored interview: which script it runs and where it stands.
 */
export interface StoredInterview {
  readonly interviewId: string;
  readonly state: InterviewState;
}

/**
 * Storage for interview records.
 *
 * Every `put` stores a new record under a fresh, unguessable key; records
 * are never updated in place.
 */
export interface InterviewStorage {
  /**
   * Stores a record.
   *
   * @returns The key to retrieve it with.
   * @throws StorageError when the record cannot be written.
   */
  put(record: StoredInterview): Promise<string>;

  /**
   * Retrieves a record.
   *
   * @returns The record, or undefined when the key is unknown or expired.
   * @throws StorageError when the stored record is corrupt.
   */
  get(key: string): Promise<StoredInterview | undefined>;
}
