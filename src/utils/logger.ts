/**
 * Structured logging utility for the configuration engine.
 *
 * Every entry is a single JSON line on stderr, so log output from the store and
 * its background tasks can be grepped and aggregated without a parser.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: Normal operation (reloads, saves, recoveries)
 * - `warn`: Conditions that were worked around (unusable backups, rejected payloads)
 * - `error`: Failed operations (writes, snapshots, watcher setup)
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "ConfigStore"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "config_reloaded"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { configId: "main", reason: "json_error" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean | undefined;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ConfigStore', debugMode: true });
 * logger.info('config_reloaded', { configId: 'main' });
 * logger.child('BackupStore').error('backup_failed', { reason: 'json_error' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Creates a logger for another component that shares this logger's debug mode.
   *
   * @param component - Component name for the new logger.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values end up here.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    process.stderr.write(line + '\n');
  }
}

/**
 * Creates the logger used when a store is constructed without one.
 *
 * @param debugMode - Whether debug entries are written.
 * @returns A logger for the `ConfigStore` component.
 */
export function createDefaultLogger(debugMode = false): Logger {
  return new Logger({ component: 'ConfigStore', debugMode });
}
