/**
 * Safe file system utilities with path validation.
 *
 * Thin wrappers over the synchronous `node:fs` API that resolve and validate
 * every path before touching the disk:
 *
 * - Empty paths and paths containing null bytes are rejected
 * - Relative paths are resolved to absolute ones, normalizing "." and ".." segments
 *
 * The engine performs one blocking read-modify-write per operation, so only
 * synchronous variants are provided.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

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
 * @throws {PathValidationError} If the path is empty, contains null bytes, or does not resolve to an absolute path.
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
 * Checks whether a file or directory exists.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.existsSync(validatedPath);
}

/**
 * Reads a UTF-8 text file.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., not found, permission denied).
 */
export function safeReadFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.readFileSync(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file, replacing any existing content.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export function safeWriteFileSync(filePath: string, data: string): void {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  fs.writeFileSync(validatedPath, data, 'utf-8');
}

/**
 * Renames a file, replacing the target if it exists.
 *
 * @param oldPath - The current path of the file.
 * @param newPath - The new path for the file.
 * @throws {PathValidationError} If either path is invalid.
 * @throws {Error} If the rename fails.
 */
export function safeRenameSync(oldPath: string, newPath: string): void {
  const validatedOldPath = validatePath(oldPath);
  const validatedNewPath = validatePath(newPath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- paths are validated by validatePath
  fs.renameSync(validatedOldPath, validatedNewPath);
}

/**
 * Deletes a file.
 *
 * @param filePath - The path to the file to delete.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be deleted.
 */
export function safeUnlinkSync(filePath: string): void {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  fs.unlinkSync(validatedPath);
}

/**
 * Creates a directory.
 *
 * @param filePath - The path to the directory to create.
 * @param options - Optional recursive flag.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be created.
 */
export function safeMkdirSync(filePath: string, options?: { recursive?: boolean }): void {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  fs.mkdirSync(validatedPath, options);
}

/**
 * Lists the entry names of a directory.
 *
 * @param filePath - The directory to read.
 * @returns Entry names, sorted.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be read.
 */
export function safeReaddirSync(filePath: string): string[] {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.readdirSync(validatedPath).sort();
}

/**
 * Returns the error code of a Node.js system error, if any.
 *
 * @param error - The caught value.
 * @returns The `code` property (e.g. `ENOENT`), or undefined.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
