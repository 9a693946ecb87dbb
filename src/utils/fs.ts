import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, basename, join } from 'path';
import { parse as parseJsonc, type ParseError, printParseErrorCode } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Write text through a temporary sibling file and rename it into place,
 * so readers see either the old content or the new content.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Atomically wrote file: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file. The parsed value is returned unvalidated.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(
      `Failed to parse JSON/JSONC file: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
      { path }
    );
  }
  return result;
}
