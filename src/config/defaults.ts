/**
 * Default engine settings.
 *
 * @packageDocumentation
 */

import type { ConfigMetadata, PartialConfigMetadata, WatcherSettings } from './types.js';

/**
 * Watcher and autosave are both off unless enabled explicitly.
 */
export const DEFAULT_WATCHER_SETTINGS: Readonly<WatcherSettings> = {
  enabled: false,
  debounceMs: 1000,
  autoSaveEnabled: false,
  autoSaveIntervalMs: 30_000,
};

/**
 * Maximum number of snapshot files kept in a backup directory.
 */
export const DEFAULT_MAX_BACKUPS = 50;

/**
 * Extension of the live config file and of its backups.
 */
export const DEFAULT_FILE_EXTENSION = 'jsonc';

/**
 * Builds the default metadata for a config id.
 *
 * @param configId - Identifier of the configuration.
 * @returns A fresh metadata object.
 */
export function createDefaultMetadata(configId: string): ConfigMetadata {
  return {
    headerComments: [
      `Configuration file for ${configId}`,
      'This file is automatically managed - custom comments will be preserved',
    ],
    footerComments: [],
    sectionComments: {},
    includeTimestamp: true,
    includeVersion: true,
    watcherSettings: { ...DEFAULT_WATCHER_SETTINGS },
  };
}

/**
 * Fills the gaps of caller-supplied metadata from the defaults for the config id.
 *
 * @param configId - Identifier of the configuration.
 * @param partial - Caller-supplied metadata, possibly empty.
 * @returns Complete metadata.
 */
export function resolveMetadata(
  configId: string,
  partial: PartialConfigMetadata = {}
): ConfigMetadata {
  const defaults = createDefaultMetadata(configId);
  const watcher = partial.watcherSettings ?? {};

  return {
    headerComments: [...(partial.headerComments ?? defaults.headerComments)],
    footerComments: [...(partial.footerComments ?? defaults.footerComments)],
    sectionComments: { ...(partial.sectionComments ?? defaults.sectionComments) },
    includeTimestamp: partial.includeTimestamp ?? defaults.includeTimestamp,
    includeVersion: partial.includeVersion ?? defaults.includeVersion,
    watcherSettings: {
      enabled: watcher.enabled ?? DEFAULT_WATCHER_SETTINGS.enabled,
      debounceMs: watcher.debounceMs ?? DEFAULT_WATCHER_SETTINGS.debounceMs,
      autoSaveEnabled: watcher.autoSaveEnabled ?? DEFAULT_WATCHER_SETTINGS.autoSaveEnabled,
      autoSaveIntervalMs: watcher.autoSaveIntervalMs ?? DEFAULT_WATCHER_SETTINGS.autoSaveIntervalMs,
    },
  };
}
