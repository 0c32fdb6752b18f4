/**
 * Debounced subscription to changes of the config file.
 *
 * The parent directory is watched rather than the file itself, since atomic
 * writes (ours and most editors') replace the file and would end a watch on
 * the old inode.
 *
 * @packageDocumentation
 */

import { watch } from 'node:fs';
import type { Logger } from '../utils/logger.js';
import { toError } from '../store/errors.js';

/**
 * The part of `fs.FSWatcher` the watcher relies on.
 */
export interface WatchHandle {
  close(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Starts a directory subscription. Injectable for testing.
 */
export type WatchFactory = (
  directory: string,
  listener: (eventType: string, filename: string | null) => void
) => WatchHandle;

/**
 * Watches with `fs.watch`, without keeping the process alive.
 */
export const defaultWatchFactory: WatchFactory = (directory, listener) =>
  watch(directory, { persistent: false }, listener);

/**
 * Options for a ChangeWatcher.
 */
export interface ChangeWatcherOptions {
  /** Directory containing the config file. */
  directory: string;
  /** Base name of the config file. */
  fileName: string;
  /** Quiet period after the last event, in milliseconds. */
  debounceMs: number;
  /** Called once the quiet period has passed. */
  onChange: () => Promise<unknown>;
  logger: Logger;
  watchFactory?: WatchFactory | undefined;
}

/**
 * Calls `onChange` after events naming the config file have settled.
 *
 * At most one `onChange` runs at a time; events arriving meanwhile cause one
 * more run after it.
 */
export class ChangeWatcher {
  private readonly options: ChangeWatcherOptions;
  private readonly watchFactory: WatchFactory;
  private handle: WatchHandle | undefined;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private running: Promise<void> | undefined;
  private rerun = false;

  constructor(options: ChangeWatcherOptions) {
    this.options = options;
    this.watchFactory = options.watchFactory ?? defaultWatchFactory;
  }

  /** Whether the subscription is open. */
  get isActive(): boolean {
    return this.handle !== undefined;
  }

  /**
   * Opens the subscription. No effect if already open.
   *
   * @returns False when the subscription could not be opened.
   */
  start(): boolean {
    if (this.handle !== undefined) {
      return true;
    }

    const { directory, fileName, logger } = this.options;
    try {
      const handle = this.watchFactory(directory, (eventType, filename) => {
        this.handleEvent(eventType, filename);
      });
      handle.on('error', (error) => {
        logger.error('watcher_error', { message: toError(error).message });
        this.teardown();
      });
      this.handle = handle;
    } catch (error) {
      logger.error('watcher_start_failed', { directory, message: toError(error).message });
      return false;
    }

    logger.info('watcher_started', { directory, fileName, debounceMs: this.options.debounceMs });
    return true;
  }

  /**
   * Closes the subscription and waits for a running `onChange` to finish.
   */
  async stop(): Promise<void> {
    const wasActive = this.handle !== undefined;
    this.teardown();
    this.rerun = false;
    if (this.running !== undefined) {
      await this.running;
    }
    if (wasActive) {
      this.options.logger.info('watcher_stopped');
    }
  }

  private teardown(): void {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.handle !== undefined) {
      this.handle.close();
      this.handle = undefined;
    }
  }

  private handleEvent(eventType: string, filename: string | null): void {
    if (this.handle === undefined) {
      return;
    }
    // Some platforms report no file name; treat that as a possible change.
    if (filename !== null && filename !== this.options.fileName) {
      return;
    }

    this.options.logger.debug('file_event', { eventType, filename });
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.fire();
    }, this.options.debounceMs);
  }

  private fire(): void {
    if (this.running !== undefined) {
      this.rerun = true;
      return;
    }
    this.running = this.runChanges().finally(() => {
      this.running = undefined;
    });
  }

  private async runChanges(): Promise<void> {
    do {
      this.rerun = false;
      try {
        await this.options.onChange();
      } catch (error) {
        this.options.logger.error('watcher_reload_failed', { message: toError(error).message });
      }
    } while (this.rerun && this.handle !== undefined);
  }
}
