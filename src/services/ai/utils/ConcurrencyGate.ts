/**
 * Counting admission control for outbound calls.
 * acquire() resolves immediately while slots are free, otherwise waits in FIFO order.
 * release() hands the slot straight to the next waiter so the count never overshoots.
 */
export class ConcurrencyGate {
  readonly capacity: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(capacity = 3) {
    this.capacity = Math.max(1, Math.trunc(capacity));
  }

  public acquire(): Promise<void> {
    if (this.active < this.capacity) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  public release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot transfers to the waiter; active stays the same
      next();
      return;
    }
    if (this.active === 0) {
      throw new Error('[ConcurrencyGate] release() called without a matching acquire()');
    }
    this.active--;
  }

  /**
   * Run `fn` inside a slot. The slot is released however `fn` settles.
   */
  public async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  public get inFlight(): number {
    return this.active;
  }

  public get waiting(): number {
    return this.waiters.length;
  }
}

export default ConcurrencyGate;
