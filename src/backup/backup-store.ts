/**
 * Timestamped snapshots of the live config file.
 *
 * Snapshots are written before anything overwrites a file the user may still
 * want: a corrupt file before self-heal, an old-version file before migration.
 * The directory is capped at a fixed number of files.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import type { Logger } from '../utils/logger.js';
import {
  hasErrorCode,
  safeCopyFile,
  safeMkdir,
  safeReadFile,
  safeReaddir,
  safeStat,
  safeUnlink,
} from '../utils/safe-fs.js';
import { BackupError, RestoreError, describeError, toError } from '../store/errors.js';
import type { ConfigPayload, PayloadDecoder } from '../store/payload.js';

/**
 * Options for a BackupStore.
 */
export interface BackupStoreOptions<T extends ConfigPayload> {
  /** Identifier used as the file name prefix. */
  configId: string;
  /** The live config file. */
  configFile: string;
  /** Directory holding the snapshots. */
  backupDir: string;
  /** Extension of snapshot files, without the dot. */
  fileExtension: string;
  /** Number of snapshots kept. */
  maxBackups: number;
  /** Decoder used to validate a restored snapshot. */
  decoder: PayloadDecoder<T>;
  logger: Logger;
  /** Clock for snapshot names (for testing). */
  now?: (() => Date) | undefined;
}

const TIMESTAMP_SUFFIX = /_(\d{8}_\d{6})\.[^.]+$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date as `yyyyMMdd_HHmmss` in local time.
 *
 * @param date - The moment to format.
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function timestampOf(name: string): string {
  return TIMESTAMP_SUFFIX.exec(name)?.[1] ?? '';
}

function descending(a: string, b: string): number {
  return a < b ? 1 : a > b ? -1 : 0;
}

/**
 * Orders snapshot names newest first: by their timestamp, then by name.
 * Names without a timestamp sort last.
 */
export function compareBackupNames(a: string, b: string): number {
  return descending(timestampOf(a), timestampOf(b)) || descending(a, b);
}

/**
 * Writes, prunes and restores snapshots for one config.
 */
export class BackupStore<T extends ConfigPayload> {
  private readonly options: BackupStoreOptions<T>;
  private readonly now: () => Date;

  constructor(options: BackupStoreOptions<T>) {
    this.options = options;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Copies the live file to `{configId}_{reason}_{yyyyMMdd_HHmmss}.{ext}` and
   * prunes the directory to the newest `maxBackups` snapshots. The snapshot
   * just written is always kept.
   *
   * @param reason - Why the snapshot is taken (a load error type, `pre_migration`, ...).
   * @returns The snapshot path, or undefined if it could not be written.
   */
  async snapshot(reason: string): Promise<string | undefined> {
    const { configId, configFile, backupDir, fileExtension } = this.options;
    const name = `${configId}_${reason}_${formatBackupTimestamp(this.now())}.${fileExtension}`;
    const backupPath = join(backupDir, name);

    try {
      await safeMkdir(backupDir);
      await safeCopyFile(configFile, backupPath);
    } catch (error) {
      const backupError = new BackupError(`Failed to create backup ${name}`, {
        cause: toError(error),
      });
      this.options.logger.error('backup_failed', { reason, error: describeError(backupError) });
      return undefined;
    }

    this.options.logger.info('backup_created', { reason, path: backupPath });
    await this.prune(name);
    return backupPath;
  }

  /**
   * Snapshot file names, newest first by the timestamp in the name.
   *
   * @returns Names (not paths); empty when the directory does not exist.
   */
  async listBackups(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await safeReaddir(this.options.backupDir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }

    const suffix = `.${this.options.fileExtension}`;
    return entries.filter((entry) => entry.endsWith(suffix)).sort(compareBackupNames);
  }

  /**
   * Reads back the most recently modified snapshot.
   *
   * @returns The decoded payload, or undefined when there is no snapshot or the
   *   newest one does not decode.
   */
  async restoreLatestValid(): Promise<T | undefined> {
    const { backupDir, decoder, logger } = this.options;

    try {
      const latest = await this.findLatest();
      if (latest === undefined) {
        logger.info('no_backups_available', { backupDir });
        return undefined;
      }

      const config = decoder.decodeText(await safeReadFile(join(backupDir, latest)));

      logger.info('backup_restored', { file: latest, version: config.version });
      return config;
    } catch (error) {
      const restoreError = new RestoreError('Failed to restore from backup', {
        cause: toError(error),
      });
      logger.warn('backup_restore_failed', { error: describeError(restoreError) });
      return undefined;
    }
  }

  private async findLatest(): Promise<string | undefined> {
    const names = await this.listBackups();
    let latest: string | undefined;
    let latestTime = Number.NEGATIVE_INFINITY;

    for (const name of names) {
      const stats = await safeStat(join(this.options.backupDir, name));
      if (stats.mtimeMs > latestTime) {
        latest = name;
        latestTime = stats.mtimeMs;
      }
    }

    return latest;
  }

  private async prune(keep: string): Promise<void> {
    const { backupDir, maxBackups, logger } = this.options;

    try {
      const others = (await this.listBackups()).filter((name) => name !== keep);
      const stale = others.slice(Math.max(maxBackups - 1, 0));
      for (const name of stale) {
        await safeUnlink(join(backupDir, name));
      }
      if (stale.length > 0) {
        logger.debug('backups_pruned', { removed: stale });
      }
    } catch (error) {
      const backupError = new BackupError('Failed to prune backups', { cause: toError(error) });
      logger.error('backup_prune_failed', { error: describeError(backupError) });
    }
  }
}
