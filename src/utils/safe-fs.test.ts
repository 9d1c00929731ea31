import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  PathValidationError,
  isNotFoundError,
  listDirectory,
  readTextFile,
  readTextFileIfExists,
  removeFile,
  resolveWithin,
  validatePath,
  writeFileAtomic,
  ensureDirectory,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'safe-fs-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve relative paths to absolute', () => {
      expect(path.isAbsolute(validatePath('./state.json'))).toBe(true);
    });

    it('should reject empty paths and null bytes', () => {
      expect(() => validatePath('')).toThrow('Path cannot be empty');
      expect(() => validatePath('/tmp/a\0b')).toThrow(PathValidationError);
    });
  });

  describe('resolveWithin', () => {
    it('should resolve names inside the directory', () => {
      expect(resolveWithin('/data/store', 'abc.json')).toBe(path.resolve('/data/store/abc.json'));
    });

    it('should reject names that escape the directory', () => {
      expect(() => resolveWithin('/data/store', '../secrets.json')).toThrow(PathValidationError);
      expect(() => resolveWithin('/data/store', '.')).toThrow(PathValidationError);
    });
  });

  describe('writeFileAtomic', () => {
    it('should write content and leave no temporary files', async () => {
      const file = join(tempDir, 'out.json');
      await writeFileAtomic(file, '{"a":1}');
      await writeFileAtomic(file, '{"a":2}');
      expect(await readFile(file, 'utf-8')).toBe('{"a":2}');
      expect(await readdir(tempDir)).toEqual(['out.json']);
    });

    it('should fail when the directory does not exist', async () => {
      await expect(writeFileAtomic(join(tempDir, 'missing', 'out.json'), 'x')).rejects.toThrow();
    });
  });

  describe('reading', () => {
    it('should read text files', async () => {
      const file = join(tempDir, 'a.txt');
      await writeFile(file, 'hello');
      expect(await readTextFile(file)).toBe('hello');
      expect(await readTextFileIfExists(file)).toBe('hello');
    });

    it('should return undefined for a missing file', async () => {
      expect(await readTextFileIfExists(join(tempDir, 'nope.txt'))).toBeUndefined();
    });

    it('should recognize not-found errors', async () => {
      const error: unknown = await readTextFile(join(tempDir, 'nope.txt')).catch(
        (caught: unknown) => caught
      );
      expect(isNotFoundError(error)).toBe(true);
      expect(isNotFoundError(new Error('other'))).toBe(false);
    });
  });

  describe('directories and removal', () => {
    it('should create nested directories and list them', async () => {
      const nested = join(tempDir, 'a', 'b');
      await ensureDirectory(nested);
      await writeFile(join(nested, 'x.json'), '{}');
      expect(await listDirectory(nested)).toEqual(['x.json']);
      expect(await listDirectory(join(tempDir, 'none'))).toEqual([]);
    });

    it('should ignore removal of missing files', async () => {
      await expect(removeFile(join(tempDir, 'none'))).resolves.toBeUndefined();
    });
  });
});
