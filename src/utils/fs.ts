import { promises as fs, type Stats } from 'fs';
import { join, dirname } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

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
 * Copy a file from source to destination, creating the destination directory
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
 * Copy a directory tree into `dest`, merging with whatever is already there.
 * Junk files (.DS_Store, Thumbs.db) are not copied.
 */
export async function copyDirectory(src: string, dest: string): Promise<void> {
  try {
    await fs.cp(src, dest, {
      recursive: true,
      force: true,
      filter: (source) => !isJunk(source.split(/[\\/]/).pop() ?? '')
    });
    logger.debug(`Copied directory: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy directory: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Rename (move) a file
 */
export async function renameFile(src: string, dest: string): Promise<void> {
  try {
    await fs.rename(src, dest);
    logger.debug(`Renamed: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Remove a file or directory recursively; a missing path is not an error
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * Create a fresh temporary directory under `parent`
 */
export async function makeTempDir(parent: string, prefix: string): Promise<string> {
  try {
    return await fs.mkdtemp(join(parent, prefix));
  } catch (error) {
    throw new FileSystemError(`Failed to create temporary directory in ${parent}`, { parent, prefix, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Get file stats
 */
export async function getStats(path: string): Promise<Stats> {
  try {
    return await fs.stat(path);
  } catch (error) {
    throw new FileSystemError(`Failed to get stats for: ${path}`, { path, error });
  }
}
