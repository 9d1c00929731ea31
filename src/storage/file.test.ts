import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { StorageError } from '../errors.js';
import { createInitialState } from '../interview/state.js';
import { FileStorage } from './file.js';
import type { StoredInterview } from './types.js';

const record: StoredInterview = {
  interviewId: 'registration',
  state: createInitialState({ target: 'case-1', data: { answer: 42 } }),
};

describe('FileStorage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'file-storage-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should write one JSON file per key', async () => {
    const directory = join(tempDir, 'records');
    const storage = new FileStorage({ directory });
    const key = await storage.put(record);

    expect(await readdir(directory)).toEqual([`${key}.json`]);
    const parsed: unknown = JSON.parse(await readFile(join(directory, `${key}.json`), 'utf-8'));
    expect(parsed).toEqual({ interviewId: 'registration', expiresAt: null, state: record.state });
  });

  it('should read back what was put', async () => {
    const storage = new FileStorage({ directory: tempDir });
    const key = await storage.put(record);
    expect(await storage.get(key)).toEqual(record);
  });

  it('should return undefined for unknown keys', async () => {
    const storage = new FileStorage({ directory: tempDir });
    expect(await storage.get('AAAAAAAAAAAAAAAAAAAA')).toBeUndefined();
  });

  it('should reject keys that are not storage keys', async () => {
    const storage = new FileStorage({ directory: tempDir });
    await expect(storage.get('../escape')).rejects.toThrow('Invalid storage key "../escape"');
    await expect(storage.get('short')).rejects.toBeInstanceOf(StorageError);
  });

  it('should delete expired records on read', async () => {
    let clock = 0;
    const storage = new FileStorage({ directory: tempDir, ttlSeconds: 60, now: () => clock });
    const key = await storage.put(record);

    clock = 60_000;
    expect(await storage.get(key)).toBeUndefined();
    expect(await readdir(tempDir)).toEqual([]);
  });

  it('should surface corrupt records as storage errors', async () => {
    const storage = new FileStorage({ directory: tempDir });
    const key = await storage.put(record);
    await writeFile(join(tempDir, `${key}.json`), '{"interviewId":');
    await expect(storage.get(key)).rejects.toMatchObject({ errorType: 'parse_error' });
  });

  it('should purge expired files and leave the rest', async () => {
    let clock = 0;
    const storage = new FileStorage({ directory: tempDir, ttlSeconds: 1, now: () => clock });
    await storage.put(record);
    clock = 5_000;
    const fresh = await storage.put(record);
    await writeFile(join(tempDir, 'notes.txt'), 'not a record');

    expect(await storage.purgeExpired()).toBe(1);
    expect((await readdir(tempDir)).sort()).toEqual([`${fresh}.json`, 'notes.txt'].sort());
  });

  it('should purge nothing when the directory does not exist', async () => {
    const storage = new FileStorage({ directory: join(tempDir, 'absent') });
    expect(await storage.purgeExpired()).toBe(0);
  });
});
