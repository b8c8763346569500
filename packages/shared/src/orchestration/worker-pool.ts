/**
 * Bounded worker pool.
 *
 * A counting semaphore: at most `size` tasks run at once, the rest wait in
 * FIFO order. Acquire and release happen synchronously on the event loop, so
 * the in-flight count can never overshoot.
 */

import { ConfigurationError } from '../errors';

export class WorkerPool {
  private active = 0;
  private peak = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigurationError(`Worker pool size must be a positive integer, got ${size}`, 'concurrency');
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get peakInFlight(): number {
    return this.peak;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /**
   * Run a task in a slot. The slot is released when the task settles,
   * whether it resolves or rejects.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.occupy();
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.occupy();
        resolve();
      });
    });
  }

  private occupy(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) next();
  }
}
