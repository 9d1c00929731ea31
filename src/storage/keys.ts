import { randomBytes } from 'node:crypto';

/** Number of random bytes in a storage key. */
export const KEY_BYTES = 32;

/**
 * Accepted key shape: base64url text of at least 16 characters.
 */
export const KEY_PATTERN = /^[A-Za-z0-9_-]{16,}$/;

/**
 * Generates an unguessable storage key.
 */
export function generateKey(): string {
  return randomBytes(KEY_BYTES).toString('base64url');
}

export function isValidKey(key: string): boolean {
  return KEY_PATTERN.test(key);
}
