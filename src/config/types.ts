/**
 * Type definitions for engine settings: file formatting metadata and the
 * behaviour of the background watcher and autosaver.
 *
 * @packageDocumentation
 */

/**
 * Settings for the file watcher and the autosaver.
 */
export interface WatcherSettings {
  /** Whether the file watcher starts when the store initializes. */
  enabled: boolean;
  /** Quiet period after the last change event before reloading, in milliseconds. Integer ≥ 0. */
  debounceMs: number;
  /** Whether the autosaver starts when the store initializes. */
  autoSaveEnabled: boolean;
  /** Interval between autosave checks, in milliseconds. Integer > 0. */
  autoSaveIntervalMs: number;
}

/**
 * Formatting and behaviour settings for one configuration file.
 */
export interface ConfigMetadata {
  /** Lines written at the top of the file inside the CONFIG_SECTION comment. */
  headerComments: readonly string[];
  /** Lines written at the bottom of the file, before END_CONFIG_SECTION. */
  footerComments: readonly string[];
  /**
   * Explanatory comments keyed by dotted property path (e.g. `"server.port"`).
   * A comment may span several lines.
   */
  sectionComments: Readonly<Record<string, string>>;
  /** Whether the header carries a `Last updated:` line. */
  includeTimestamp: boolean;
  /** Whether the header carries a `Version:` line. */
  includeVersion: boolean;
  /** Watcher and autosave behaviour. */
  watcherSettings: WatcherSettings;
}

/**
 * Metadata as accepted from callers. Omitted fields fall back to the defaults
 * for the config id.
 */
export interface PartialConfigMetadata {
  headerComments?: readonly string[] | undefined;
  footerComments?: readonly string[] | undefined;
  sectionComments?: Readonly<Record<string, string>> | undefined;
  includeTimestamp?: boolean | undefined;
  includeVersion?: boolean | undefined;
  watcherSettings?: Partial<WatcherSettings> | undefined;
}
