/**
 * Schema version reconciliation.
 *
 * A file written under an older (or newer) schema version is merged into the
 * current in-memory config and the compiled default, so user values survive
 * while keys the current schema added or dropped are handled. The merge is
 * shallow: a nested object is taken from one side as a whole.
 *
 * @packageDocumentation
 */

import type { JsonObject } from '../jsonc/types.js';
import { toJsonObject } from '../jsonc/serializer.js';
import type { Logger } from '../utils/logger.js';
import { isKindCompatible } from '../store/payload.js';
import type { ConfigPayload, PayloadDecoder } from '../store/payload.js';

/**
 * Outcome of a migration.
 */
export interface MigrationResult<T extends ConfigPayload> {
  /** The reconciled config, at the current version. */
  config: T;
  /** Version found in the migrated file. */
  fromVersion: string;
  /** Keys whose value was taken from the migrated file. */
  migratedFields: string[];
  /** Keys of the migrated file that were dropped: unknown to the schema, or of the wrong kind. */
  skippedFields: string[];
}

/**
 * Returns a copy of `base` in which every top-level key that `overlay` also has
 * (except `version`) takes the overlay's value, with `version` set to
 * `currentVersion`.
 *
 * @param overlay - Values to carry over.
 * @param base - Object supplying the key set.
 * @param currentVersion - Version stamped on the result.
 */
export function mergeConfigs(
  overlay: JsonObject,
  base: JsonObject,
  currentVersion: string
): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (key !== 'version' && Object.hasOwn(base, key)) {
      merged[key] = value;
    }
  }
  merged.version = currentVersion;
  return merged;
}

/**
 * Anything that can take a snapshot before the live file is overwritten.
 */
export interface SnapshotWriter {
  snapshot(reason: string): Promise<string | undefined>;
}

/**
 * Options for a MigrationEngine.
 */
export interface MigrationEngineOptions<T extends ConfigPayload> {
  currentVersion: string;
  defaultConfig: T;
  /** Decoder for the current schema. */
  decoder: PayloadDecoder<T>;
  backups: SnapshotWriter;
  logger: Logger;
}

/**
 * Merges configs written under another schema version into the current one.
 */
export class MigrationEngine<T extends ConfigPayload> {
  private readonly currentVersion: string;
  private readonly defaultTree: JsonObject;
  private readonly decoder: PayloadDecoder<T>;
  private readonly backups: SnapshotWriter;
  private readonly logger: Logger;

  constructor(options: MigrationEngineOptions<T>) {
    this.currentVersion = options.currentVersion;
    this.defaultTree = toJsonObject(options.defaultConfig);
    this.decoder = options.decoder;
    this.backups = options.backups;
    this.logger = options.logger;
  }

  /**
   * Snapshots the live file with reason `pre_migration`, then reconciles.
   *
   * @param old - Parsed content of the live file.
   * @param current - The in-memory config.
   */
  async migrate(old: JsonObject, current: T): Promise<MigrationResult<T>> {
    await this.backups.snapshot('pre_migration');
    return this.reconcile(old, current);
  }

  /**
   * Three-way merge without a snapshot: values from `old` over `current` over
   * the default. Keys the schema does not know, or whose value kind no longer
   * matches, are skipped rather than failing the merge.
   *
   * @param old - Config written under another version.
   * @param current - The in-memory config.
   */
  reconcile(old: JsonObject, current: T): MigrationResult<T> {
    const fromVersion = typeof old.version === 'string' ? old.version : 'unknown';
    const shape = this.decoder.shape;
    const carried: JsonObject = {};
    const migratedFields: string[] = [];
    const skippedFields: string[] = [];

    for (const [key, value] of Object.entries(old)) {
      if (key === 'version') continue;
      const expected = Object.hasOwn(shape, key) ? shape[key] : undefined;
      if (expected === undefined || !isKindCompatible(expected, value)) {
        skippedFields.push(key);
        continue;
      }
      carried[key] = value;
      migratedFields.push(key);
    }

    const merged = mergeConfigs(
      mergeConfigs(carried, toJsonObject(current), this.currentVersion),
      this.defaultTree,
      this.currentVersion
    );
    const config = this.decoder.decode(merged);

    this.logger.info('config_migrated', {
      fromVersion,
      toVersion: this.currentVersion,
      migratedFields,
      skippedFields,
    });

    return { config, fromVersion, migratedFields, skippedFields };
  }
}
