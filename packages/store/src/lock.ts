/**
 * In-process mutex for serializing document mutations
 *
 * Waiters are released in FIFO order. The lock is not reentrant.
 */
export class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      // Ownership passes directly to the next waiter
      next();
    } else {
      this.#locked = false;
    }
  }

  /**
   * Check if the lock is currently held
   */
  isLocked(): boolean {
    return this.#locked;
  }

  /**
   * Number of callers waiting for the lock
   */
  get pending(): number {
    return this.#queue.length;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
