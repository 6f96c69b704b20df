/**
 * Counting semaphore for bounding the number of in-flight async operations.
 * Waiters are served in FIFO order.
 */
export class Semaphore {
  private readonly capacity: number;
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be an integer >= 1, got ${capacity}`);
    }
    this.capacity = capacity;
    this.available = capacity;
  }

  get availablePermits(): number {
    return this.available;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Resolves once a permit is held by the caller.
   */
  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Hands the permit to the longest-waiting caller, or returns it to the pool.
   * Extra releases never push the pool past its capacity.
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.available = Math.min(this.available + 1, this.capacity);
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
