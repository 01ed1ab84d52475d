import { promises as fs, constants as fsConstants } from 'fs';
import { join, dirname } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

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
 * Check if a path is a regular file the current user may execute
 */
export async function isExecutable(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function isWritable(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size of a file in bytes, or null when it does not exist
 */
export async function fileSize(path: string): Promise<number | null> {
  try {
    const stats = await fs.stat(path);
    return stats.size;
  } catch {
    return null;
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
 * Make sure `filePath` is a regular, writable file.
 *
 * Creates the file when it is missing (the parent directory must already
 * exist and be writable) and adds the owner write bit when it is read-only.
 */
export async function ensureFileWritable(filePath: string, description: string = 'File'): Promise<void> {
  if (!filePath) {
    throw new FileSystemError('File path argument is missing.');
  }

  if (!(await exists(filePath))) {
    const parentDir = dirname(filePath);
    if (!(await isDirectory(parentDir))) {
      throw new FileSystemError(`Parent directory does not exist: ${parentDir}`, { filePath });
    }
    if (!(await isWritable(parentDir))) {
      throw new FileSystemError(`Parent directory is not writable: ${parentDir}`, { filePath });
    }
    try {
      await fs.writeFile(filePath, '', { flag: 'a' });
      logger.debug(`Created ${description}: ${filePath}`);
    } catch (error) {
      throw new FileSystemError(`Failed to create ${description}: ${filePath}.`, { filePath, error });
    }
  } else if (!(await isFile(filePath))) {
    throw new FileSystemError(`Path exists but is not a regular file: ${filePath}`, { filePath });
  }

  if (await isWritable(filePath)) {
    return;
  }

  try {
    const stats = await fs.stat(filePath);
    await fs.chmod(filePath, stats.mode | 0o200);
    logger.debug(`Added owner write permission to ${description}: ${filePath}`);
  } catch (error) {
    throw new FileSystemError(
      `Failed to modify permissions for ${description}: ${filePath}. Check ownership and permissions.`,
      { filePath, error }
    );
  }

  if (!(await isWritable(filePath))) {
    throw new FileSystemError(`Still not writable after chmod (unexpected): ${filePath}.`, { filePath });
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
 * Append text to a file, creating it when absent
 */
export async function appendTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await fs.appendFile(path, content, encoding);
    logger.debug(`Appended to file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to append to file: ${path}`, { path, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    const stats = await fs.stat(path);
    if (stats.isDirectory()) {
      await fs.rm(path, { recursive: true });
    } else {
      await fs.unlink(path);
    }
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

export interface CopyContentsResult {
  copied: string[];
  failed: Array<{ name: string; error: unknown }>;
}

/**
 * Copy every entry of `srcDir` into `destDir` (created if absent), skipping
 * OS junk such as .DS_Store and __MACOSX. Existing destination entries are
 * overwritten. Per-entry failures are collected rather than thrown.
 */
export async function copyDirectoryContents(srcDir: string, destDir: string): Promise<CopyContentsResult> {
  await ensureDir(destDir);

  let entries: string[];
  try {
    entries = await fs.readdir(srcDir);
  } catch (error) {
    throw new FileSystemError(`Failed to list directory: ${srcDir}`, { srcDir, error });
  }

  const result: CopyContentsResult = { copied: [], failed: [] };
  for (const name of entries) {
    if (isJunk(name) || name === '__MACOSX') {
      logger.debug(`Skipping junk entry: ${name}`);
      continue;
    }
    try {
      await fs.cp(join(srcDir, name), join(destDir, name), { recursive: true, force: true });
      result.copied.push(name);
    } catch (error) {
      logger.debug(`Failed to copy ${name} into ${destDir}`, { error });
      result.failed.push({ name, error });
    }
  }

  logger.debug(`Copied ${result.copied.length} entries: ${srcDir} -> ${destDir}`);
  return result;
}
