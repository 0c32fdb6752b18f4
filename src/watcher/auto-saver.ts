/**
 * Periodic save of the in-memory config.
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import { toError } from '../store/errors.js';

/**
 * Options for an AutoSaver.
 */
export interface AutoSaverOptions {
  /** Milliseconds between ticks. */
  intervalMs: number;
  /** Work done on each tick; resolves to whether anything was saved. */
  onTick: () => Promise<boolean>;
  logger: Logger;
}

/**
 * Runs `onTick` on an interval. A tick that finds the previous one still
 * running is skipped. The timer does not keep the process alive.
 */
export class AutoSaver {
  private readonly options: AutoSaverOptions;
  private interval: ReturnType<typeof setInterval> | undefined;
  private inFlight: Promise<void> | undefined;

  constructor(options: AutoSaverOptions) {
    this.options = options;
  }

  /** Whether the interval is running. */
  get isActive(): boolean {
    return this.interval !== undefined;
  }

  /**
   * Starts the interval. No effect if already running.
   */
  start(): void {
    if (this.interval !== undefined) {
      return;
    }
    this.interval = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);
    this.interval.unref();
    this.options.logger.info('autosave_started', { intervalMs: this.options.intervalMs });
  }

  /**
   * Stops the interval and waits for a running tick to finish.
   */
  async stop(): Promise<void> {
    const wasActive = this.interval !== undefined;
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    if (this.inFlight !== undefined) {
      await this.inFlight;
    }
    if (wasActive) {
      this.options.logger.info('autosave_stopped');
    }
  }

  private tick(): void {
    if (this.inFlight !== undefined) {
      this.options.logger.debug('autosave_tick_skipped');
      return;
    }
    this.inFlight = this.runTick().finally(() => {
      this.inFlight = undefined;
    });
  }

  private async runTick(): Promise<void> {
    try {
      const saved = await this.options.onTick();
      if (saved) {
        this.options.logger.debug('autosave_completed');
      }
    } catch (error) {
      this.options.logger.error('autosave_failed', { message: toError(error).message });
    }
  }
}
