/**
 * Per-session exclusive lock
 *
 * Waiters are chained on a promise so they acquire in submission order.
 */

export type Release = () => void;

export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private waiting = 0;

  get locked(): boolean {
    return this.held;
  }

  get pending(): number {
    return this.waiting;
  }

  /**
   * Wait for the lock; resolves with the function that releases it
   */
  acquire(): Promise<Release> {
    const previous = this.tail;
    const turn = this.nextTurn();
    this.waiting++;

    return previous.then(() => {
      this.waiting--;
      this.held = true;
      return turn;
    });
  }

  /**
   * Take the lock only if nobody holds or waits for it
   */
  tryAcquire(): Release | null {
    if (this.held || this.waiting > 0) {
      return null;
    }
    const turn = this.nextTurn();
    this.held = true;
    return turn;
  }

  /**
   * Run fn while holding the lock
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private nextTurn(): Release {
    let done: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      done = resolve;
    });

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
      done();
    };
  }
}
