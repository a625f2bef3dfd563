import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { parse as parseJsonc, type ParseError } from 'jsonc-parser';
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
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
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
    logger.debug(`Directory located or created: ${path}`);
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
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * List subdirectory names of a directory, or [] when it does not exist
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw new FileSystemError(`Failed to list directories: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Last modification time in milliseconds, or null when the file is missing
 */
export async function getModifiedTime(path: string): Promise<number | null> {
  try {
    const stats = await fs.stat(path);
    return stats.mtimeMs;
  } catch {
    return null;
  }
}

/**
 * Read a JSON or JSONC file (JSON with comments) and parse it
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    throw new FileSystemError(`Failed to parse JSONC file: ${path}`, { path, errors });
  }
  return result;
}

/**
 * Write object to a JSONC-compatible file
 */
export async function writeJsoncFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  try {
    const content = JSON.stringify(data, null, indent);
    await writeTextFile(path, content + '\n');
  } catch (error) {
    throw new FileSystemError(`Failed to write JSONC file: ${path}`, { path, error });
  }
}
