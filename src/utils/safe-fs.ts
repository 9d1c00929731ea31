/**
 * File system helpers with path validation.
 *
 * Every path is resolved to an absolute path and checked before use. Writes
 * go through a temporary file in the same directory followed by a rename,
 * so readers never see a partially written file.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }
  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }
  return path.resolve(filePath);
}

/**
 * Resolves a file name inside a directory, refusing names that escape it.
 *
 * @param directory - The containing directory.
 * @param name - A file name relative to the directory.
 * @returns The absolute path of the file.
 * @throws {PathValidationError} If the result lies outside the directory.
 */
export function resolveWithin(directory: string, name: string): string {
  const root = validatePath(directory);
  const resolved = validatePath(path.join(root, name));
  const relative = path.relative(root, resolved);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathValidationError(`Path escapes its directory "${root}"`, name);
  }
  return resolved;
}

/**
 * Checks whether an error is a file-not-found error.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a UTF-8 text file.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/**
 * Reads a UTF-8 text file, or returns undefined when it does not exist.
 *
 * @throws {Error} If the file exists but cannot be read.
 */
export async function readTextFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await readTextFile(filePath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Creates a directory and its parents.
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(validatePath(dirPath), { recursive: true });
}

/**
 * Writes a file through a temporary sibling and a rename.
 *
 * @param filePath - The destination.
 * @param content - The text to write.
 * @throws {Error} If writing fails; the temporary file is removed first.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const target = validatePath(filePath);
  const tempPath = `${target}.${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, target);
  } catch (error) {
    await removeFile(tempPath);
    throw error;
  }
}

/**
 * Deletes a file. A file that does not exist is not an error.
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(validatePath(filePath));
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw error;
    }
  }
}

/**
 * Lists the entry names of a directory; an absent directory lists nothing.
 */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(validatePath(dirPath));
  } catch (error) {
    if (isNotFoundError(error)) {
      return [];
    }
    throw error;
  }
}
