/**
 * @dashsync/utils
 * 
 * Shared utilities package containing:
 * - File operations
 * - Path utilities
 * - Type guards
 * - Time helpers
 * - Logger
 */

// File operations
export { ensureDir, safeStat, walkFiles } from './file.js';

// Path utilities
export { toPosixPath, isWithin, getExtension } from './path.js';

// Type guards
export { isErrnoException, splitList } from './guards.js';

// Time utilities
export { sleep, formatDuration, utcTimestamp } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
