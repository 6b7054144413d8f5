/**
 * Admits at most `limit` matrix entries at a time; the rest wait in
 * arrival order.
 */
export class Semaphore {
  private readonly waiting: Array<() => void> = [];
  private slots: number;

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`maxParallel must be a positive integer, got ${limit}`);
    }
    this.slots = limit;
  }

  async run<T>(entry: () => Promise<T>): Promise<T> {
    if (this.slots > 0) {
      this.slots--;
    } else {
      await new Promise<void>((admit) => this.waiting.push(admit));
    }

    try {
      return await entry();
    } finally {
      // Hand the slot straight to the next waiter, if any
      const next = this.waiting.shift();
      if (next) next();
      else this.slots++;
    }
  }
}
