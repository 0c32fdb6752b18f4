/**
 * Backup module exports.
 *
 * @packageDocumentation
 */

export { BackupStore, compareBackupNames, formatBackupTimestamp } from './backup-store.js';
export type { BackupStoreOptions } from './backup-store.js';
