/**
 * Validation for engine settings.
 *
 * Checks what the type system cannot: numeric ranges of the watcher settings
 * and comment text that would break the JSONC layout if written verbatim.
 *
 * @packageDocumentation
 */

import type { ConfigMetadata } from './types.js';

/**
 * Error thrown when engine settings are invalid.
 */
export class ConfigSettingsError extends Error {
  /** Every validation failure found. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigSettingsError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigSettingsError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validateCommentLines(
  lines: readonly string[],
  field: string,
  errors: ValidationError[]
): void {
  lines.forEach((line, index) => {
    if (line.includes('*/')) {
      errors.push({
        field: `${field}[${String(index)}]`,
        value: line,
        message: 'Comment line must not contain "*/"',
      });
    }
    if (/[\r\n]/.test(line)) {
      errors.push({
        field: `${field}[${String(index)}]`,
        value: line,
        message: 'Comment line must not contain line breaks',
      });
    }
  });
}

/**
 * Validates metadata.
 *
 * @param metadata - Metadata to validate.
 * @returns Validation result listing every failure.
 *
 * @example
 * ```typescript
 * const result = validateMetadata(resolveMetadata('main', { watcherSettings: { debounceMs: -1 } }));
 * result.valid; // false
 * result.errors[0]?.field; // 'watcherSettings.debounceMs'
 * ```
 */
export function validateMetadata(metadata: ConfigMetadata): ValidationResult {
  const errors: ValidationError[] = [];
  const { debounceMs, autoSaveIntervalMs } = metadata.watcherSettings;

  if (!Number.isInteger(debounceMs) || debounceMs < 0) {
    errors.push({
      field: 'watcherSettings.debounceMs',
      value: debounceMs,
      message: 'Must be an integer greater than or equal to 0',
    });
  }

  if (!Number.isInteger(autoSaveIntervalMs) || autoSaveIntervalMs <= 0) {
    errors.push({
      field: 'watcherSettings.autoSaveIntervalMs',
      value: autoSaveIntervalMs,
      message: 'Must be an integer greater than 0',
    });
  }

  validateCommentLines(metadata.headerComments, 'headerComments', errors);
  validateCommentLines(metadata.footerComments, 'footerComments', errors);

  for (const path of Object.keys(metadata.sectionComments)) {
    if (path.trim() === '') {
      errors.push({
        field: 'sectionComments',
        value: path,
        message: 'Section comment path must not be empty',
      });
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validates metadata and throws when it is invalid.
 *
 * @param metadata - Metadata to validate.
 * @throws ConfigSettingsError listing every failure.
 */
export function assertMetadataValid(metadata: ConfigMetadata): void {
  const result = validateMetadata(metadata);
  if (!result.valid) {
    const summary = result.errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    throw new ConfigSettingsError(`Invalid config metadata: ${summary}`, result.errors);
  }
}

/**
 * Store settings that are not part of the metadata.
 */
export interface StoreSettings {
  /** Identifier of the config, used as a directory and file name prefix. */
  configId: string;
  /** Schema version the running code expects. */
  currentVersion: string;
  /** Version carried by the compiled-in default. */
  defaultVersion: string;
  /** Extension of the config file and backups, without the dot. */
  fileExtension: string;
  /** Number of backups kept. */
  maxBackups: number;
}

const SAFE_NAME = /^[A-Za-z0-9._-]+$/;

/**
 * Validates the store settings.
 *
 * @param settings - Settings to validate.
 * @returns Validation result listing every failure.
 */
export function validateStoreSettings(settings: StoreSettings): ValidationResult {
  const errors: ValidationError[] = [];
  const { configId, currentVersion, defaultVersion, fileExtension, maxBackups } = settings;

  if (!SAFE_NAME.test(configId) || configId === '.' || configId === '..') {
    errors.push({
      field: 'defaultConfig.configId',
      value: configId,
      message: 'Must be a non-empty name of letters, digits, ".", "_" or "-"',
    });
  }

  if (currentVersion.trim() === '') {
    errors.push({ field: 'currentVersion', value: currentVersion, message: 'Must not be empty' });
  } else if (defaultVersion !== currentVersion) {
    errors.push({
      field: 'defaultConfig.version',
      value: defaultVersion,
      message: `Must equal currentVersion "${currentVersion}"`,
    });
  }

  if (!/^[A-Za-z0-9]+$/.test(fileExtension)) {
    errors.push({
      field: 'fileExtension',
      value: fileExtension,
      message: 'Must be a non-empty run of letters and digits',
    });
  }

  if (!Number.isInteger(maxBackups) || maxBackups < 1) {
    errors.push({
      field: 'maxBackups',
      value: maxBackups,
      message: 'Must be an integer greater than 0',
    });
  }

  return { valid: errors.length === 0, errors };
}
