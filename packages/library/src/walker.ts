/**
 * Library Walker
 *
 * Finds every video file under a root directory. Symbolic links are not
 * followed, and the transaction's own sidecar files never match.
 */

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, getExtension } from '@tracksmith/utils';
import { describeError } from '@tracksmith/core';

const log = createLogger({ module: 'walker' });

export const VIDEO_EXTENSIONS: readonly string[] = [
  'mp4', 'mkv', 'avi', 'mov', 'm4v', 'flv', 'wmv', 'webm', 'mpg', 'mpeg',
];

const ARTIFACT_SUFFIXES = ['.backup', '.partial'];

/**
 * True when the filename's extension (case-insensitive) is in the allow-list
 */
export function isVideoFile(filename: string, extensions: readonly string[] = VIDEO_EXTENSIONS): boolean {
  const lower = filename.toLowerCase();
  if (ARTIFACT_SUFFIXES.some((suffix) => lower.endsWith(suffix))) {
    return false;
  }
  const ext = getExtension(lower);
  return ext !== '' && extensions.includes(ext);
}

/**
 * Yield matching files depth-first. Unreadable subdirectories are logged and skipped.
 */
export async function* walkLibrary(
  root: string,
  extensions: readonly string[] = VIDEO_EXTENSIONS
): AsyncGenerator<string> {
  const normalized = extensions.map((ext) => ext.toLowerCase().replace(/^\./, ''));
  yield* walkDirectory(root, root, normalized);
}

async function* walkDirectory(
  dir: string,
  root: string,
  extensions: readonly string[]
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (dir === root) {
      throw error;
    }
    log.warn({ dir, error: describeError(error) }, 'Failed to scan directory');
    return;
  }

  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      yield* walkDirectory(fullPath, root, extensions);
    } else if (entry.isFile() && isVideoFile(entry.name, extensions)) {
      yield fullPath;
    }
  }
}

/**
 * All matching files under `root`, in walk order
 */
export async function collectLibrary(
  root: string,
  extensions: readonly string[] = VIDEO_EXTENSIONS
): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkLibrary(root, extensions)) {
    files.push(file);
  }
  return files;
}
