/**
 * Counting semaphore with FIFO hand-off to waiters
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(count: number) {
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Semaphore count must be a positive integer, got ${count}`);
    }
    this.available = count;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }

    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes directly to the next waiter; `available` stays unchanged
      next();
    } else {
      this.available++;
    }
  }

  /**
   * Number of callers currently blocked in acquire()
   */
  get waiting(): number {
    return this.waiters.length;
  }
}
