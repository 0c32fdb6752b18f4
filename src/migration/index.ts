/**
 * Migration module exports.
 *
 * @packageDocumentation
 */

export { MigrationEngine, mergeConfigs } from './migration.js';
export type { MigrationEngineOptions, MigrationResult, SnapshotWriter } from './migration.js';
