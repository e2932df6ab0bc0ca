/** Simple mutex for async operations */
export class Mutex {
  private locked = false;
  private queue: (() => void)[] = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  /** Run `task` while holding the lock. */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private release(): void {
    this.locked = false;
    // Hand the lock straight to the next waiter
    const next = this.queue.shift();
    if (next) next();
  }

  isLocked(): boolean {
    return this.locked;
  }
}
