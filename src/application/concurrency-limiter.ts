/**
 * Caps how many tasks run at once; excess tasks wait in FIFO order.
 *
 * Also tracks every task it has accepted so shutdown can wait for
 * in-flight work with `drain()`.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly slotWaiters: Array<() => void> = [];
  private readonly inFlight = new Set<Promise<void>>();

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
  }

  /** Tasks accepted and not yet settled (running + queued). */
  get pending(): number {
    return this.inFlight.size;
  }

  /** Currently executing tasks. */
  get running(): number {
    return this.active;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.acquire()
      .then(task)
      .finally(() => this.release());

    const settled: Promise<void> = result.then(
      () => { this.inFlight.delete(settled); },
      () => { this.inFlight.delete(settled); },
    );
    this.inFlight.add(settled);

    return result;
  }

  /**
   * Resolves `true` once a task handed to `run()` would start at once.
   * Resolves `false` if `signal` aborts while waiting.
   */
  async waitForSlot(signal?: AbortSignal): Promise<boolean> {
    while (this.active >= this.limit) {
      if (signal?.aborted) return false;
      await new Promise<void>((resolve) => {
        const onAbort = (): void => {
          const index = this.slotWaiters.indexOf(onSlot);
          if (index !== -1) this.slotWaiters.splice(index, 1);
          resolve();
        };
        const onSlot = (): void => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
        this.slotWaiters.push(onSlot);
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }
    return true;
  }

  /** Resolves once every task accepted so far (and any they enqueue) has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Slot passes straight to the next waiter.
      next();
      return;
    }
    this.active--;
    this.slotWaiters.shift()?.();
  }
}
