/**
 * @transcoder/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
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
  isReadableFile,
  removeFile,
} from './file.js';

// Path utilities
export {
  getBasename,
  deriveOutputPath,
} from './path.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatClock,
  parseTimecode,
  formatBytes,
} from './time.js';

// Logger
export { logger, createLogger, buildLoggerOptions, type Logger } from './logger.js';
