/**
 * Counting admission gate. At most `capacity` callers hold a slot at once;
 * the rest wait in arrival order and are handed a slot as one is released.
 */
export class ConcurrencyLimiter {
  readonly capacity: number;
  private active = 0;
  private queue: (() => void)[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency limiter capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }

  acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter, active count unchanged.
      next();
      return;
    }
    if (this.active === 0) {
      throw new Error('release() called without a matching acquire()');
    }
    this.active--;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
