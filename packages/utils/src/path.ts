/**
 * Path Utilities
 */

import { createHash } from 'node:crypto';
import { extname, basename } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    // Limit length (preserve extension)
    .substring(0, 200);
}

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * First 10 hex digits of the SHA-1 of a path
 */
export function pathDigest(filePath: string): string {
  return createHash('sha1').update(filePath).digest('hex').substring(0, 10);
}

/**
 * Filesystem-safe stem that is unique per absolute path.
 * Two files called "Movie.mkv" in different folders get different stems.
 */
export function uniqueStem(filePath: string): string {
  const stem = sanitizeFilename(getBasename(filePath)).substring(0, 80) || 'file';
  return `${stem}-${pathDigest(filePath)}`;
}
