/**
 * Config store exports.
 *
 * @packageDocumentation
 */

export { ConfigStore, openConfigStore } from './config-store.js';
export type {
  ConfigPaths,
  ConfigStoreOptions,
  RecoverySource,
  ReloadResult,
} from './config-store.js';
export {
  BackupError,
  ConfigKeeperError,
  ConfigLoadError,
  RestoreError,
  SaveError,
  describeError,
  toError,
} from './errors.js';
export type { ConfigLoadErrorType } from './errors.js';
export { PayloadDecoder, cloneConfig, hashConfig, isKindCompatible, kindOf } from './payload.js';
export type { ConfigPayload, JsonKind, JsonSchema, PayloadDecoderOptions } from './payload.js';
