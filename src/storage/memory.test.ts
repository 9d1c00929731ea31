import { describe, it, expect } from 'vitest';
import { createInitialState } from '../interview/state.js';
import { isValidKey } from './keys.js';
import { MemoryStorage } from './memory.js';
import type { StoredInterview } from './types.js';

function recordFor(interviewId: string): StoredInterview {
  return { interviewId, state: createInitialState({ data: { name: interviewId } }) };
}

describe('MemoryStorage', () => {
  it('should return what was put under a fresh key', async () => {
    const storage = new MemoryStorage();
    const key = await storage.put(recordFor('a'));
    expect(isValidKey(key)).toBe(true);
    expect(await storage.get(key)).toEqual(recordFor('a'));
  });

  it('should issue a new key for every put', async () => {
    const storage = new MemoryStorage();
    const first = await storage.put(recordFor('a'));
    const second = await storage.put(recordFor('a'));
    expect(first).not.toBe(second);
    expect(storage.size).toBe(2);
  });

  it('should return undefined for unknown keys', async () => {
    expect(await new MemoryStorage().get('missing-key-0000000')).toBeUndefined();
  });

  it('should not alias stored state', async () => {
    const storage = new MemoryStorage();
    const key = await storage.put(recordFor('a'));
    const loaded = await storage.get(key);
    const again = await storage.get(key);
    expect(loaded).not.toBe(again);
    expect(loaded).toEqual(again);
  });

  it('should expire records after the ttl', async () => {
    let clock = 1_000;
    const storage = new MemoryStorage({ ttlSeconds: 10, now: () => clock });
    const key = await storage.put(recordFor('a'));

    clock = 10_999;
    expect(await storage.get(key)).toEqual(recordFor('a'));

    clock = 11_000;
    expect(await storage.get(key)).toBeUndefined();
    expect(storage.size).toBe(0);
  });

  it('should purge expired records', async () => {
    let clock = 0;
    const storage = new MemoryStorage({ ttlSeconds: 1, now: () => clock });
    await storage.put(recordFor('a'));
    await storage.put(recordFor('b'));
    clock = 5_000;
    expect(storage.purgeExpired()).toBe(2);
    expect(storage.size).toBe(0);
  });

  it('should drop the oldest record when full', async () => {
    const storage = new MemoryStorage({ maxEntries: 2 });
    const first = await storage.put(recordFor('a'));
    const second = await storage.put(recordFor('b'));
    const third = await storage.put(recordFor('c'));

    expect(storage.size).toBe(2);
    expect(await storage.get(first)).toBeUndefined();
    expect(await storage.get(second)).toEqual(recordFor('b'));
    expect(await storage.get(third)).toEqual(recordFor('c'));
  });

  it('should treat a zero size or ttl as unbounded', async () => {
    let clock = 0;
    const storage = new MemoryStorage({ maxEntries: 0, ttlSeconds: 0, now: () => clock });
    const keys = [await storage.put(recordFor('a')), await storage.put(recordFor('b'))];
    keys.push(await storage.put(recordFor('c')));

    clock = 1_000_000_000;
    expect(storage.size).toBe(3);
    expect(await storage.get(keys[0] ?? '')).toEqual(recordFor('a'));
    expect(storage.purgeExpired()).toBe(0);
  });

  it('should purge only the expired records at the front', async () => {
    let clock = 0;
    const storage = new MemoryStorage({ ttlSeconds: 10, now: () => clock });
    await storage.put(recordFor('a'));
    clock = 5_000;
    const live = await storage.put(recordFor('b'));

    clock = 12_000;
    expect(storage.purgeExpired()).toBe(1);
    expect(storage.size).toBe(1);
    expect(await storage.get(live)).toEqual(recordFor('b'));
  });
});
