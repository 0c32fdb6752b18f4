/**
 * Background task exports.
 *
 * @packageDocumentation
 */

export { ChangeWatcher, defaultWatchFactory } from './change-watcher.js';
export type { ChangeWatcherOptions, WatchFactory, WatchHandle } from './change-watcher.js';
export { AutoSaver } from './auto-saver.js';
export type { AutoSaverOptions } from './auto-saver.js';
