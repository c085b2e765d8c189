/**
 * Concurrency Limiter
 * Caps concurrent external calls (places lookups) within one request
 *
 * Calls beyond the cap wait in FIFO order for a free slot
 */

export class ConcurrencyLimiter {
  private activeCalls = 0;
  private readonly waiters: Array<() => void> = [];
  private stats = {
    total: 0,
    queued: 0,
    maxActive: 0,
  };

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Execute function once a slot is free
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.stats.total++;

    if (this.activeCalls >= this.maxConcurrent) {
      this.stats.queued++;
      // The finishing call hands its slot over; activeCalls already counts us
      await new Promise<void>(resolve => this.waiters.push(resolve));
    } else {
      this.activeCalls++;
    }

    this.stats.maxActive = Math.max(this.stats.maxActive, this.activeCalls);

    try {
      return await fn();
    } finally {
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.activeCalls--;
      }
    }
  }

  /**
   * Run fn over all items under the cap; results keep input order
   */
  map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item, index) => this.execute(() => fn(item, index))));
  }

  getStats() {
    return {
      ...this.stats,
      activeNow: this.activeCalls,
      capacity: this.maxConcurrent,
    };
  }
}
