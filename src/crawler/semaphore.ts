// Counting limiter bounding the number of in-flight operations

export class Semaphore {
  private inFlight = 0;
  private waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  get active(): number {
    return this.inFlight;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.inFlight < this.capacity) {
      this.inFlight++;
      return;
    }
    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // slot passes straight to the next waiter
      next();
      return;
    }
    this.inFlight = Math.max(0, this.inFlight - 1);
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
