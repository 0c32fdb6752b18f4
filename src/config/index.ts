/**
 * Engine settings: file formatting metadata, watcher and autosave behaviour,
 * their defaults, validation and environment overrides.
 *
 * Override precedence: env > constructor metadata > defaults
 *
 * @packageDocumentation
 */

export type { ConfigMetadata, PartialConfigMetadata, WatcherSettings } from './types.js';
export {
  DEFAULT_FILE_EXTENSION,
  DEFAULT_MAX_BACKUPS,
  DEFAULT_WATCHER_SETTINGS,
  createDefaultMetadata,
  resolveMetadata,
} from './defaults.js';
export {
  ConfigSettingsError,
  assertMetadataValid,
  validateMetadata,
  validateStoreSettings,
} from './validator.js';
export type { StoreSettings, ValidationError, ValidationResult } from './validator.js';
export {
  DEBUG_ENV_VAR,
  EnvCoercionError,
  applyEnvOverrides,
  readDebugFlag,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
