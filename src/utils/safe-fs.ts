/**
 * Safe file system utilities with path validation.
 *
 * Every wrapper resolves its path to an absolute one and rejects empty paths
 * and paths containing null bytes before touching the file system. The config
 * directory is supplied by the host application, so nothing reaches `node:fs`
 * unchecked.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
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

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Returns true when `error` is a Node.js system error with the given code.
 *
 * @param error - Any thrown value.
 * @param code - System error code such as `ENOENT`.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a file with write-to-temp-then-rename semantics, so readers (and the
 * file watcher) never observe a partially written file.
 *
 * The temporary file lives beside the target and starts with a dot. It is
 * removed again if the rename fails.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 */
export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  const tempPath = path.join(
    path.dirname(validatedPath),
    `.${path.basename(validatedPath)}-${randomUUID()}.tmp`
  );

  try {
    await fs.writeFile(tempPath, data, 'utf-8');
    await fs.rename(tempPath, validatedPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Creates a directory (and its parents) after validating the path.
 *
 * @param dirPath - The directory to create.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Lists the entry names of a directory after validating the path.
 *
 * @param dirPath - The directory to read.
 * @returns Entry names, in the order the file system returns them.
 */
export async function safeReaddir(dirPath: string): Promise<string[]> {
  const validatedPath = validatePath(dirPath);
  return fs.readdir(validatedPath);
}

/**
 * Gets file statistics after validating the path.
 *
 * @param filePath - The path to the file or directory.
 */
export async function safeStat(filePath: string): Promise<Stats> {
  const validatedPath = validatePath(filePath);
  return fs.stat(validatedPath);
}

/**
 * Copies a file after validating both paths. An existing destination is replaced.
 *
 * @param sourcePath - The file to copy.
 * @param destinationPath - Where to write the copy.
 */
export async function safeCopyFile(sourcePath: string, destinationPath: string): Promise<void> {
  const validatedSource = validatePath(sourcePath);
  const validatedDestination = validatePath(destinationPath);
  return fs.copyFile(validatedSource, validatedDestination);
}

/**
 * Deletes a file after validating the path.
 *
 * @param filePath - The path to the file to delete.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.unlink(validatedPath);
}
