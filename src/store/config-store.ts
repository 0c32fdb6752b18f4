/**
 * The configuration store: one typed config kept in sync with one JSONC file.
 *
 * The store owns all engine state. Every operation that reads or writes that
 * state runs under a single FIFO mutex, so a watcher-triggered reload, a
 * manual reload and a save apply in arrival order and the last one wins.
 * No public operation rejects: failures are logged and resolved through the
 * self-heal chain (reload) or ignored (save).
 *
 * @packageDocumentation
 */

import { basename, dirname, join } from 'node:path';
import { BackupStore } from '../backup/index.js';
import {
  ConfigSettingsError,
  DEFAULT_FILE_EXTENSION,
  DEFAULT_MAX_BACKUPS,
  EnvCoercionError,
  applyEnvOverrides,
  readDebugFlag,
  resolveMetadata,
  validateMetadata,
  validateStoreSettings,
} from '../config/index.js';
import type { ConfigMetadata, EnvRecord, PartialConfigMetadata } from '../config/index.js';
import { parseConfigText, serializeJsonc, toJsonObject } from '../jsonc/index.js';
import type { CommentIndex } from '../jsonc/index.js';
import { MigrationEngine } from '../migration/index.js';
import { createDefaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import {
  atomicWriteFile,
  hasErrorCode,
  safeMkdir,
  safeReadFile,
  safeStat,
} from '../utils/safe-fs.js';
import { AutoSaver, ChangeWatcher } from '../watcher/index.js';
import type { WatchFactory } from '../watcher/index.js';
import { ConfigLoadError, SaveError, describeError, toError } from './errors.js';
import type { ConfigLoadErrorType } from './errors.js';
import { PayloadDecoder, cloneConfig, hashConfig } from './payload.js';
import type { ConfigPayload, JsonSchema } from './payload.js';

/**
 * Options for a ConfigStore.
 */
export interface ConfigStoreOptions<T extends ConfigPayload> {
  /** Schema version the running code expects. */
  currentVersion: string;
  /** Compiled-in default. Its `configId` names the files; its `version` must equal `currentVersion`. */
  defaultConfig: T;
  /** Root directory; the store uses `{configDir}/{configId}/`. */
  configDir: string;
  /** Formatting and background task settings; omitted fields take the defaults. */
  metadata?: PartialConfigMetadata | undefined;
  /** JSON Schema checked after the shape check. */
  schema?: JsonSchema | undefined;
  /** Extension of the config file and backups. Default `jsonc`. */
  fileExtension?: string | undefined;
  /** Number of backups kept. Default 50. */
  maxBackups?: number | undefined;
  /** Logger; defaults to a `ConfigStore` logger with debug mode from the environment. */
  logger?: Logger | undefined;
  /** Environment for overrides. Default `process.env`. */
  env?: EnvRecord | undefined;
  /** Clock for headers and backup names (for testing). */
  now?: (() => Date) | undefined;
  /** Directory subscription used by the watcher (for testing). */
  watchFactory?: WatchFactory | undefined;
}

/**
 * Where a recovered config came from.
 */
export type RecoverySource = 'backup' | 'last_valid' | 'default';

/**
 * Outcome of a reload.
 */
export type ReloadResult =
  | { kind: 'created_default' }
  | { kind: 'unchanged' }
  | { kind: 'reloaded' }
  | {
      kind: 'migrated';
      fromVersion: string;
      migratedFields: string[];
      skippedFields: string[];
    }
  | {
      kind: 'recovered';
      reason: ConfigLoadErrorType;
      source: RecoverySource;
      backupPath: string | undefined;
    }
  | { kind: 'closed' };

/**
 * Files used by a store.
 */
export interface ConfigPaths {
  readonly configFile: string;
  readonly backupDir: string;
}

interface Fingerprint {
  mtimeMs: number;
  size: number;
}

function freezeMetadata(metadata: ConfigMetadata): Readonly<ConfigMetadata> {
  return Object.freeze({
    ...metadata,
    headerComments: Object.freeze([...metadata.headerComments]),
    footerComments: Object.freeze([...metadata.footerComments]),
    sectionComments: Object.freeze({ ...metadata.sectionComments }),
    watcherSettings: Object.freeze({ ...metadata.watcherSettings }),
  });
}

function toSettingsError(error: EnvCoercionError): ConfigSettingsError {
  return new ConfigSettingsError(`Invalid environment override: ${error.message}`, [
    { field: error.envVar, value: error.rawValue, message: error.message },
  ]);
}

function resolveSettings(
  configId: string,
  partial: PartialConfigMetadata | undefined,
  env: EnvRecord
): ConfigMetadata {
  const metadata = resolveMetadata(configId, partial);
  try {
    return { ...metadata, watcherSettings: applyEnvOverrides(metadata.watcherSettings, env) };
  } catch (error) {
    if (error instanceof EnvCoercionError) {
      throw toSettingsError(error);
    }
    throw error;
  }
}

function resolveLogger(logger: Logger | undefined, env: EnvRecord): Logger {
  if (logger !== undefined) {
    return logger;
  }
  try {
    return createDefaultLogger(readDebugFlag(env));
  } catch (error) {
    if (error instanceof EnvCoercionError) {
      throw toSettingsError(error);
    }
    throw error;
  }
}

/**
 * Keeps a typed, versioned config in sync with a JSONC file.
 *
 * @example
 * ```typescript
 * const store = await openConfigStore({
 *   currentVersion: '1.0',
 *   defaultConfig: { version: '1.0', configId: 'main', port: 8080 },
 *   configDir: './config',
 *   metadata: { sectionComments: { port: 'Port to listen on' } },
 * });
 * store.getCurrentConfig().port;
 * await store.cleanup();
 * ```
 */
export class ConfigStore<T extends ConfigPayload> {
  /** Files used by this store. */
  readonly paths: ConfigPaths;
  /** Resolved metadata, after environment overrides. */
  readonly metadata: Readonly<ConfigMetadata>;

  private readonly currentVersion: string;
  private readonly defaultConfig: T;
  private readonly defaultHash: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();
  private readonly decoder: PayloadDecoder<T>;
  private readonly backups: BackupStore<T>;
  private readonly migration: MigrationEngine<T>;
  private readonly watcher: ChangeWatcher;
  private readonly autoSaver: AutoSaver;

  private current: T;
  private lastValid: T;
  private lastSavedHash: string | undefined;
  private fingerprint: Fingerprint | undefined;
  private comments: CommentIndex = new Map<string, string>();
  private closed = false;

  /**
   * Creates a store. Nothing touches the disk until {@link initialize}.
   *
   * @param options - Store options.
   * @throws ConfigSettingsError if the options, metadata or environment
   *   overrides are invalid.
   */
  constructor(options: ConfigStoreOptions<T>) {
    const env = options.env ?? process.env;
    const configId = options.defaultConfig.configId;
    const fileExtension = options.fileExtension ?? DEFAULT_FILE_EXTENSION;
    const maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;

    const metadata = resolveSettings(configId, options.metadata, env);
    const errors = [
      ...validateStoreSettings({
        configId,
        currentVersion: options.currentVersion,
        defaultVersion: options.defaultConfig.version,
        fileExtension,
        maxBackups,
      }).errors,
      ...validateMetadata(metadata).errors,
    ];
    if (errors.length > 0) {
      const summary = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
      throw new ConfigSettingsError(`Invalid config store settings: ${summary}`, errors);
    }

    this.metadata = freezeMetadata(metadata);
    this.currentVersion = options.currentVersion;
    this.logger = resolveLogger(options.logger, env);
    this.now = options.now ?? ((): Date => new Date());

    try {
      this.decoder = new PayloadDecoder({
        defaultConfig: options.defaultConfig,
        schema: options.schema,
        logger: this.logger,
      });
    } catch (error) {
      const cause = toError(error);
      throw new ConfigSettingsError(`Invalid config store settings: ${cause.message}`, [
        {
          field: options.schema === undefined ? 'defaultConfig' : 'schema',
          value: options.schema,
          message: cause.message,
        },
      ]);
    }

    this.defaultConfig = cloneConfig(options.defaultConfig);
    this.defaultHash = hashConfig(this.defaultConfig);
    this.current = cloneConfig(this.defaultConfig);
    this.lastValid = cloneConfig(this.defaultConfig);

    const storeDir = join(options.configDir, configId);
    this.paths = Object.freeze({
      configFile: join(storeDir, `config.${fileExtension}`),
      backupDir: join(storeDir, 'backups'),
    });

    this.backups = new BackupStore({
      configId,
      configFile: this.paths.configFile,
      backupDir: this.paths.backupDir,
      fileExtension,
      maxBackups,
      decoder: this.decoder,
      logger: this.logger.child('BackupStore'),
      now: this.now,
    });

    this.migration = new MigrationEngine({
      currentVersion: this.currentVersion,
      defaultConfig: this.defaultConfig,
      decoder: this.decoder,
      backups: this.backups,
      logger: this.logger.child('MigrationEngine'),
    });

    this.watcher = new ChangeWatcher({
      directory: storeDir,
      fileName: basename(this.paths.configFile),
      debounceMs: this.metadata.watcherSettings.debounceMs,
      onChange: () => this.reload(),
      logger: this.logger.child('ChangeWatcher'),
      watchFactory: options.watchFactory,
    });

    this.autoSaver = new AutoSaver({
      intervalMs: this.metadata.watcherSettings.autoSaveIntervalMs,
      onTick: () => this.saveIfChanged(),
      logger: this.logger.child('AutoSaver'),
    });
  }

  /**
   * Creates the directories, writes the default file if none exists or loads
   * the existing one, then starts the background tasks the settings enable.
   *
   * @returns The outcome of loading the file.
   */
  async initialize(): Promise<ReloadResult> {
    if (this.isClosed('initialize')) {
      return { kind: 'closed' };
    }

    const result = await this.mutex.runExclusive(async () => {
      try {
        await safeMkdir(dirname(this.paths.configFile));
        await safeMkdir(this.paths.backupDir);
      } catch (error) {
        this.logger.error('directory_setup_failed', {
          configFile: this.paths.configFile,
          message: toError(error).message,
        });
      }
      return this.reloadLocked();
    });

    const { enabled, autoSaveEnabled } = this.metadata.watcherSettings;
    if (enabled) {
      this.watcher.start();
    }
    if (autoSaveEnabled) {
      this.autoSaver.start();
    }

    this.logger.info('store_initialized', {
      configId: this.defaultConfig.configId,
      version: this.currentVersion,
      result: result.kind,
    });
    return result;
  }

  /**
   * The live config. Never blocks; returns the same object until a reload,
   * save or recovery replaces it, so in-place edits are picked up by
   * {@link saveIfChanged}.
   */
  getCurrentConfig(): T {
    return this.current;
  }

  /**
   * Brings the in-memory config up to date with the file.
   *
   * A missing file is recreated from the default; an unchanged file (same
   * modification time and size) is not read; an older version is migrated;
   * a file that cannot be loaded is backed up and replaced through the
   * self-heal chain.
   */
  async reload(): Promise<ReloadResult> {
    if (this.isClosed('reload')) {
      return { kind: 'closed' };
    }
    return this.mutex.runExclusive(() => this.reloadLocked());
  }

  /**
   * Same as {@link reload}.
   */
  async reloadManually(): Promise<ReloadResult> {
    return this.reload();
  }

  /**
   * Makes `config` the current config and writes it to the file.
   * Write failures are logged and otherwise ignored.
   *
   * @param config - The new config.
   */
  async save(config: T): Promise<void> {
    if (this.isClosed('save')) {
      return;
    }
    await this.mutex.runExclusive(async () => {
      this.current = config;
      await this.writeConfig(config);
    });
  }

  /**
   * Writes the current config if it differs from what was last written or read.
   *
   * @returns True when the file was written.
   */
  async saveIfChanged(): Promise<boolean> {
    if (this.isClosed('saveIfChanged')) {
      return false;
    }
    return this.mutex.runExclusive(async () => {
      if (hashConfig(this.current) === this.lastSavedHash) {
        return false;
      }
      return this.writeConfig(this.current);
    });
  }

  /** Starts the file watcher. No effect if it is running. */
  enableWatcher(): void {
    if (this.isClosed('enableWatcher')) {
      return;
    }
    this.watcher.start();
  }

  /** Stops the file watcher and waits for a running reload. */
  async disableWatcher(): Promise<void> {
    await this.watcher.stop();
  }

  /** Starts the autosaver. No effect if it is running. */
  enableAutoSave(): void {
    if (this.isClosed('enableAutoSave')) {
      return;
    }
    this.autoSaver.start();
  }

  /** Stops the autosaver and waits for a running tick. */
  async disableAutoSave(): Promise<void> {
    await this.autoSaver.stop();
  }

  /** Whether the file watcher is running. */
  get isWatching(): boolean {
    return this.watcher.isActive;
  }

  /** Whether the autosaver is running. */
  get isAutoSaving(): boolean {
    return this.autoSaver.isActive;
  }

  /**
   * Stops both background tasks and waits for queued operations. Afterwards
   * every operation except {@link getCurrentConfig} does nothing.
   */
  async cleanup(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.watcher.stop();
    await this.autoSaver.stop();
    await this.mutex.runExclusive(() => Promise.resolve());
    this.logger.info('store_closed', { configId: this.defaultConfig.configId });
  }

  private isClosed(operation: string): boolean {
    if (this.closed) {
      this.logger.warn('store_closed_operation_ignored', { operation });
    }
    return this.closed;
  }

  private async reloadLocked(): Promise<ReloadResult> {
    const { configFile } = this.paths;

    let stats: Fingerprint;
    try {
      stats = await safeStat(configFile);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return this.createDefault();
      }
      return this.selfHeal(
        new ConfigLoadError('Failed to read config file', 'reload_error', { cause: toError(error) })
      );
    }

    if (
      this.fingerprint !== undefined &&
      stats.mtimeMs === this.fingerprint.mtimeMs &&
      stats.size === this.fingerprint.size
    ) {
      this.logger.debug('config_unchanged', { configFile });
      return { kind: 'unchanged' };
    }

    try {
      const content = await safeReadFile(configFile);
      const parsed = parseConfigText(content);
      const envelope = this.decoder.parseEnvelope(parsed);
      const { comments } = parsed;

      if (envelope.version !== this.currentVersion) {
        const result = await this.migration.migrate(envelope, this.current);
        this.comments = comments;
        this.current = result.config;
        this.lastValid = cloneConfig(result.config);
        await this.writeConfig(result.config);
        return {
          kind: 'migrated',
          fromVersion: result.fromVersion,
          migratedFields: result.migratedFields,
          skippedFields: result.skippedFields,
        };
      }

      const config = this.decoder.decode(envelope);
      this.current = config;
      this.lastValid = cloneConfig(config);
      this.comments = comments;
      this.lastSavedHash = hashConfig(config);
      this.fingerprint = { mtimeMs: stats.mtimeMs, size: stats.size };
      this.logger.info('config_reloaded', { configFile, version: config.version });
      return { kind: 'reloaded' };
    } catch (error) {
      const loadError =
        error instanceof ConfigLoadError
          ? error
          : new ConfigLoadError('Failed to load config file', 'reload_error', {
              cause: toError(error),
            });
      return this.selfHeal(loadError);
    }
  }

  private async createDefault(): Promise<ReloadResult> {
    this.current = cloneConfig(this.defaultConfig);
    this.comments = new Map<string, string>();
    await this.writeConfig(this.current);
    this.logger.info('default_config_created', { configFile: this.paths.configFile });
    return { kind: 'created_default' };
  }

  private async selfHeal(error: ConfigLoadError): Promise<ReloadResult> {
    const reason = error.errorType;
    this.logger.warn('config_load_failed', { error: describeError(error) });

    const backupPath = await this.backups.snapshot(reason);
    const restored = await this.backups.restoreLatestValid();

    let source: RecoverySource;
    let config: T;
    if (restored !== undefined) {
      source = 'backup';
      config =
        restored.version === this.currentVersion
          ? restored
          : this.migration.reconcile(toJsonObject(restored), this.current).config;
      this.lastValid = cloneConfig(config);
    } else if (hashConfig(this.lastValid) !== this.defaultHash) {
      source = 'last_valid';
      config = cloneConfig(this.lastValid);
    } else {
      source = 'default';
      config = cloneConfig(this.defaultConfig);
    }

    this.current = config;
    await this.writeConfig(config);
    this.logger.info('self_heal_completed', { reason, source, backupPath });
    return { kind: 'recovered', reason, source, backupPath };
  }

  /**
   * Serializes and atomically writes `config`, then records its hash and the
   * file's new fingerprint so the write is not seen as an external change.
   */
  private async writeConfig(config: T): Promise<boolean> {
    const { configFile } = this.paths;
    try {
      const text = serializeJsonc(config, {
        metadata: this.metadata,
        currentVersion: this.currentVersion,
        comments: this.comments,
        now: this.now,
      });
      await safeMkdir(dirname(configFile));
      await atomicWriteFile(configFile, text);
      this.lastSavedHash = hashConfig(config);
      const stats = await safeStat(configFile);
      this.fingerprint = { mtimeMs: stats.mtimeMs, size: stats.size };
      this.logger.debug('config_saved', { configFile });
      return true;
    } catch (error) {
      const saveError = new SaveError('Failed to save config file', { cause: toError(error) });
      this.logger.error('config_save_failed', { configFile, error: describeError(saveError) });
      return false;
    }
  }
}

/**
 * Creates a store and initializes it.
 *
 * @param options - Store options.
 * @returns The initialized store.
 * @throws ConfigSettingsError if the options are invalid.
 */
export async function openConfigStore<T extends ConfigPayload>(
  options: ConfigStoreOptions<T>
): Promise<ConfigStore<T>> {
  const store = new ConfigStore(options);
  await store.initialize();
  return store;
}
