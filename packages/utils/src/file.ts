/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  mkdir,
  stat,
  rename,
  rm,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Size of a regular file, or null when nothing is there
 */
export async function statFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.isFile() ? stats.size : null;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * True when the path is a regular file with at least one byte
 */
export async function isNonEmptyFile(filePath: string): Promise<boolean> {
  const size = await statFileSize(filePath);
  return size !== null && size > 0;
}

/**
 * True when the path exists and is a directory
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Copy a file to a new location
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
}

/**
 * Remove a file if it exists; a missing file is not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Remove a directory tree if it exists
 */
export async function removeDir(dirPath: string): Promise<void> {
  await rm(dirPath, { recursive: true, force: true });
}

/**
 * Replace `destination` with `source` so the destination path only ever holds
 * the old or the new file in full.
 *
 * A plain rename when both paths share a filesystem. Across filesystems the
 * file is copied to `sidecar` (which must sit next to `destination`), checked
 * for size, then renamed over the destination.
 */
export async function replaceFileAtomically(
  source: string,
  destination: string,
  sidecar: string
): Promise<'rename' | 'copy'> {
  try {
    await rename(source, destination);
    return 'rename';
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
  }

  try {
    await fsCopyFile(source, sidecar);
    const [expected, actual] = await Promise.all([getFileSizeBytes(source), getFileSizeBytes(sidecar)]);
    if (expected !== actual) {
      throw new Error(`Copy to ${sidecar} is ${actual} bytes, expected ${expected}`);
    }
    await rename(sidecar, destination);
  } catch (error) {
    await removeFile(sidecar);
    throw error;
  }

  await removeFile(source);
  return 'copy';
}
