/**
 * SessionLock: FIFO async mutual exclusion for one session.
 *
 * Each caller waits for the previous holder's promise to settle. The lock
 * is released when the critical section settles, whether it resolved or
 * threw.
 */

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Number of callers holding or queued for the lock. */
  get pending(): number {
    return this.waiting;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.waiting++;

    await previous;
    try {
      return await fn();
    } finally {
      this.waiting--;
      release();
    }
  }
}
