import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '../utils/logger.js';
import { AutoSaver } from './auto-saver.js';

describe('AutoSaver', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function createSaver(onTick: () => Promise<boolean>): AutoSaver {
    return new AutoSaver({
      intervalMs: 30_000,
      onTick,
      logger: new Logger({ component: 'AutoSaver' }),
    });
  }

  it('should tick on every interval', async () => {
    const onTick = vi.fn(() => Promise.resolve(true));
    const saver = createSaver(onTick);

    saver.start();
    saver.start();
    await vi.advanceTimersByTimeAsync(90_000);

    expect(onTick).toHaveBeenCalledTimes(3);
    expect(saver.isActive).toBe(true);
    await saver.stop();
  });

  it('should skip ticks while the previous one is still running', async () => {
    let finish: (saved: boolean) => void = () => undefined;
    const onTick = vi.fn(
      () =>
        new Promise<boolean>((resolve) => {
          finish = resolve;
        })
    );
    const saver = createSaver(onTick);

    saver.start();
    await vi.advanceTimersByTimeAsync(90_000);
    expect(onTick).toHaveBeenCalledTimes(1);

    finish(false);
    await vi.advanceTimersByTimeAsync(30_000);
    expect(onTick).toHaveBeenCalledTimes(2);

    finish(false);
    await saver.stop();
  });

  it('should keep ticking after a failed tick', async () => {
    const onTick = vi
      .fn<[], Promise<boolean>>()
      .mockRejectedValueOnce(new Error('disk full'))
      .mockResolvedValue(false);
    const saver = createSaver(onTick);

    saver.start();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(onTick).toHaveBeenCalledTimes(2);
    await saver.stop();
  });

  it('should wait for a running tick on stop and tick no more', async () => {
    let finish: (saved: boolean) => void = () => undefined;
    const onTick = vi.fn(
      () =>
        new Promise<boolean>((resolve) => {
          finish = resolve;
        })
    );
    const saver = createSaver(onTick);
    saver.start();
    await vi.advanceTimersByTimeAsync(30_000);

    let stopped = false;
    const stopping = saver.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finish(true);
    await stopping;
    await vi.advanceTimersByTimeAsync(60_000);

    expect(stopped).toBe(true);
    expect(saver.isActive).toBe(false);
    expect(onTick).toHaveBeenCalledTimes(1);
  });
});
