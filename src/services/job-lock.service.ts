/**
 * Process-wide mutual exclusion for print jobs: at most one job between
 * acquire and release, waiters served in arrival order.
 */
export class JobLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private held = false;

  /** Resolves with a release function once every earlier holder has released */
  async acquire(): Promise<() => void> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    this.waiting++;
    await previous;
    this.waiting--;
    this.held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
      release();
    };
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }

  /** Callers blocked in acquire() */
  pending(): number {
    return this.waiting;
  }
}
