/**
 * Promise-based FIFO mutex.
 *
 * Waiters are granted the lock in the order they called `acquire`. There is no
 * timeout; callers needing a bound must race the promise themselves.
 *
 * @packageDocumentation
 */

export class Mutex {
  private readonly queue: Array<(release: () => void) => void> = [];
  private locked = false;

  /**
   * Whether the lock is currently held.
   */
  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Waits for the lock.
   *
   * @returns A release function. Calling it more than once has no effect.
   */
  acquire(): Promise<() => void> {
    return new Promise<() => void>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
      } else {
        this.queue.push(resolve);
      }
    });
  }

  /**
   * Runs `task` while holding the lock and releases it afterwards, whether the
   * task resolves or rejects.
   *
   * @param task - Work to run exclusively.
   * @returns The task's result.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
