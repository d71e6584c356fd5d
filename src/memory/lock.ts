/**
 * Exclusive async lock.
 *
 * Callers run one at a time in the order they called `run()`. A rejected
 * task releases the lock and rejects only its own caller.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Number of tasks holding or waiting for the lock.
   */
  get size(): number {
    return this.pending;
  }

  async run<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
