/**
 * @chaptify/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Type guards
 * - Time utilities
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
  safeReadFile,
  removeIfExists,
  getFileSizeBytes,
  moveFile,
  tempSiblingPath,
} from './file.js';

// Retry logic
export { retry, defaultRetryOptions, type RetryOptions } from './retry.js';

// Type guards
export { isErrnoException } from './guards.js';

// Time utilities
export { sleep, formatTimecode, secondsToMs } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
