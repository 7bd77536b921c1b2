/**
 * Concurrency Limiter
 * Counting semaphore with FIFO waiters, shared by every HTTP request of a run
 */

export class ConcurrencyLimiter {
  private active = 0;
  private peak = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Concurrency capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Run `task` while holding one slot; the slot is released on every exit path
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getActiveCount(): number {
    return this.active;
  }

  getPendingCount(): number {
    return this.waiters.length;
  }

  /**
   * Highest number of simultaneously held slots since construction
   */
  getPeakCount(): number {
    return this.peak;
  }

  getCapacity(): number {
    return this.capacity;
  }

  private acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.take();
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.take();
        resolve();
      });
    });
  }

  private take(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) next();
  }
}
