/**
 * @sortwell/utils
 * 
 * Shared utilities package containing:
 * - File operations and tree walking
 * - Hashing utilities
 * - Path utilities
 * - Type guards
 * - Time utilities
 * - Logger
 */

// File operations
export {
  ensureDir,
  pathExists,
  calculateFileHash,
  walkTree,
  listRegularFiles,
  type FileHashOptions,
  type TreeEntry,
  type WalkOptions,
} from './file.js';

// Path utilities
export {
  getExtension,
  splitFileName,
  isWithin,
} from './path.js';

// Type guards
export {
  isString,
  isErrnoException,
  errorCode,
} from './guards.js';

// Time utilities
export {
  DAY_MS,
  toMillis,
  sleep,
  formatDuration,
  formatMegabytes,
  type TimeUnit,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
