/**
 * Counting semaphore for async tasks.
 *
 * Waiters are released in FIFO order. A permit count below 1 (or not a
 * finite number) is treated as 1.
 */
export class Semaphore {
  private readonly permits: number;
  private inUse = 0;
  private waiters: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = Number.isFinite(permits) && permits >= 1 ? Math.floor(permits) : 1;
  }

  get capacity(): number {
    return this.permits;
  }

  get active(): number {
    return this.inUse;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.inUse < this.permits) {
      this.inUse++;
      return;
    }

    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // permit passes straight to the next waiter
      next();
      return;
    }

    if (this.inUse > 0) {
      this.inUse--;
    }
  }

  /**
   * Run a task while holding a permit
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
