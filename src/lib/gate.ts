/**
 * Counting admission gate. At most `permits` holders run at once; the rest wait
 * in arrival order, although callers must not rely on that order.
 */
export class AdmissionGate {
  private available: number;
  private readonly waiting: Array<() => void> = [];
  private active = 0;
  private peak = 0;

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`admission gate needs a positive integer permit count, got ${permits}`);
    }
    this.available = permits;
  }

  get inUse(): number {
    return this.active;
  }

  get peakInUse(): number {
    return this.peak;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      this.markActive();
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
    this.markActive();
  }

  release(): void {
    this.active -= 1;
    const next = this.waiting.shift();
    if (next) {
      // permit passes straight to the next waiter
      next();
      return;
    }
    this.available += 1;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private markActive(): void {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
  }
}
