/**
 * Safe file system utilities with path validation.
 *
 * Every path is resolved and validated before use. Per-user directories are
 * additionally confined to their storage root with {@link resolveWithin}.
 * Writes that the audit trail depends on are durable when the returned
 * promise resolves: {@link writeFileAtomic} renames a synced temp file into
 * place and {@link appendLineDurable} syncs after appending.
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

  /**
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

  return path.resolve(filePath);
}

/**
 * Resolves `segment` below `root`, refusing anything that escapes it.
 *
 * @param root - Directory the result must stay inside.
 * @param segment - Relative path segment (for example a user id).
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the result would leave `root`.
 */
export function resolveWithin(root: string, segment: string): string {
  const resolvedRoot = validatePath(root);
  const resolved = validatePath(path.join(resolvedRoot, segment));
  const relative = path.relative(resolvedRoot, resolved);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new PathValidationError(`Path escapes storage root "${resolvedRoot}"`, segment);
  }

  return resolved;
}

/**
 * Reads a UTF-8 file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/**
 * Reads a UTF-8 file, resolving to `undefined` when it does not exist.
 * Any other read failure is rethrown.
 */
export async function safeReadFileIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await safeReadFile(filePath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Creates a directory (recursively) after validating the path.
 */
export async function safeMkdir(dirPath: string): Promise<void> {
  await fs.mkdir(validatePath(dirPath), { recursive: true });
}

/**
 * Renames a file after validating both paths.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  await fs.rename(validatePath(oldPath), validatePath(newPath));
}

/**
 * Removes a file after validating the path.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  await fs.unlink(validatePath(filePath));
}

/**
 * Writes `content` to `filePath` atomically.
 *
 * The content goes to a synced temp file in the same directory which is then
 * renamed over the target. Readers see either the old or the new content.
 *
 * @param filePath - Destination file.
 * @param content - UTF-8 content.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const target = validatePath(filePath);
  const tempPath = path.join(path.dirname(target), `.${path.basename(target)}-${randomUUID()}.tmp`);

  try {
    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await safeRename(tempPath, target);
  } catch (error) {
    await safeUnlink(tempPath).catch((cleanupError: unknown) => {
      if (!isNotFoundError(cleanupError)) {
        throw cleanupError;
      }
    });
    throw error;
  }
}

/**
 * Appends one line to `filePath` and syncs before resolving.
 *
 * @param filePath - JSONL file to append to (created if missing).
 * @param line - Line content without the trailing newline.
 */
export async function appendLineDurable(filePath: string, line: string): Promise<void> {
  if (line.includes('\n')) {
    throw new Error(`Appended line for "${filePath}" cannot contain a newline`);
  }

  const handle = await fs.open(validatePath(filePath), 'a');
  try {
    await handle.appendFile(line + '\n', 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Whether a caught value is a Node.js "file not found" error.
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
