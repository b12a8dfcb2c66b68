/**
 * @tracksmith/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time and size formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  getFileSizeBytes,
  statFileSize,
  isNonEmptyFile,
  isDirectory,
  copyFile,
  removeFile,
  removeDir,
  replaceFileAtomically,
} from './file.js';

// Path utilities
export {
  sanitizeFilename,
  getExtension,
  getBasename,
  uniqueStem,
  pathDigest,
} from './path.js';

// Type guards
export {
  isString,
  isNumber,
  isDefined,
  toNonNegativeInt,
} from './guards.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
  formatTimestamp,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
