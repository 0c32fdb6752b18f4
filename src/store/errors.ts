/**
 * Error types raised inside the engine.
 *
 * None of these escape a public ConfigStore operation: each is caught where it
 * is raised, logged, and resolved through the self-heal chain or ignored.
 *
 * @packageDocumentation
 */

/**
 * Why a config file could not be loaded. Also used as the backup reason.
 */
export type ConfigLoadErrorType = 'empty_file' | 'parse_error' | 'json_error' | 'reload_error';

/**
 * Base class for engine errors.
 */
export class ConfigKeeperError extends Error {
  /** Additional details about the error. */
  public readonly details: string | undefined;

  /**
   * Creates a new ConfigKeeperError.
   *
   * @param message - Human-readable error message.
   * @param options - Details and the underlying cause.
   */
  constructor(message: string, options?: { details?: string | undefined; cause?: Error | undefined }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConfigKeeperError';
    this.details = options?.details;
  }
}

/**
 * The config file (or a backup) could not be turned into a valid payload.
 */
export class ConfigLoadError extends ConfigKeeperError {
  /** The kind of load failure. */
  public readonly errorType: ConfigLoadErrorType;

  constructor(
    message: string,
    errorType: ConfigLoadErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message, options);
    this.name = 'ConfigLoadError';
    this.errorType = errorType;
  }
}

/**
 * A snapshot could not be written or pruned.
 */
export class BackupError extends ConfigKeeperError {
  constructor(message: string, options?: { details?: string | undefined; cause?: Error | undefined }) {
    super(message, options);
    this.name = 'BackupError';
  }
}

/**
 * A backup could not be read back.
 */
export class RestoreError extends ConfigKeeperError {
  constructor(message: string, options?: { details?: string | undefined; cause?: Error | undefined }) {
    super(message, options);
    this.name = 'RestoreError';
  }
}

/**
 * The config file could not be written.
 */
export class SaveError extends ConfigKeeperError {
  constructor(message: string, options?: { details?: string | undefined; cause?: Error | undefined }) {
    super(message, options);
    this.name = 'SaveError';
  }
}

/**
 * Normalizes a thrown value to an Error.
 *
 * @param value - Anything caught by a `catch` clause.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Loggable form of an error: its name, message, details, load error type and
 * cause chain.
 *
 * @param error - The error to describe.
 */
export function describeError(error: Error): Record<string, unknown> {
  const described: Record<string, unknown> = { name: error.name, message: error.message };
  if (error instanceof ConfigKeeperError && error.details !== undefined) {
    described.details = error.details;
  }
  if (error instanceof ConfigLoadError) {
    described.errorType = error.errorType;
  }
  if (error.cause !== undefined) {
    described.cause = describeError(toError(error.cause));
  }
  return described;
}
