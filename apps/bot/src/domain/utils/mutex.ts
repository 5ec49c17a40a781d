/**
 * Promise-chain mutex. Callers queue in arrival order and each critical
 * section starts only after the previous one has settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const prev = this.tail;

    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = prev.then(() => next);
    this.pending++;

    await prev;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Sections queued or running */
  get queued(): number {
    return this.pending;
  }
}
