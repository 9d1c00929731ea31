import { describe, it, expect } from 'vitest';
import { generateKey, isValidKey, KEY_BYTES } from './keys.js';

describe('storage keys', () => {
  it('should encode the random bytes as base64url without padding', () => {
    const key = generateKey();
    expect(key).toHaveLength(Math.ceil((KEY_BYTES * 4) / 3));
    expect(key).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(isValidKey(key)).toBe(true);
  });

  it('should not repeat keys', () => {
    const keys = new Set(Array.from({ length: 100 }, () => generateKey()));
    expect(keys.size).toBe(100);
  });

  it('should reject short keys and path characters', () => {
    expect(isValidKey('abc')).toBe(false);
    expect(isValidKey('../../etc/passwd0000')).toBe(false);
    expect(isValidKey('a'.repeat(15))).toBe(false);
    expect(isValidKey('a'.repeat(16))).toBe(true);
  });
});
