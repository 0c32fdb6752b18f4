/**
 * jsonc-config-keeper
 *
 * Keeps a typed, versioned configuration object in sync with a
 * human-editable JSONC file: comments survive rewrites, corrupt files are
 * backed up and replaced, and older schema versions are migrated.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './store/index.js';
export * from './config/index.js';
export * from './jsonc/index.js';
export * from './backup/index.js';
export * from './migration/index.js';
export * from './watcher/index.js';
export { Logger, createDefaultLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { Mutex } from './utils/mutex.js';
