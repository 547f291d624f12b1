export type Release = () => void;

/**
 * Async shared/exclusive lock. Waiting writers block new readers so a
 * pending model swap cannot starve behind a steady stream of inference.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private waitingWriters = 0;
  private waiters: Array<() => void> = [];

  async acquireRead(): Promise<Release> {
    while (this.writer || this.waitingWriters > 0) {
      await this.wait();
    }
    this.readers++;
    return this.once(() => {
      this.readers--;
      this.wakeAll();
    });
  }

  async acquireWrite(): Promise<Release> {
    this.waitingWriters++;
    try {
      while (this.writer || this.readers > 0) {
        await this.wait();
      }
    } finally {
      this.waitingWriters--;
    }
    this.writer = true;
    return this.once(() => {
      this.writer = false;
      this.wakeAll();
    });
  }

  get activeReaders(): number {
    return this.readers;
  }

  private wait(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private wakeAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter();
  }

  private once(fn: () => void): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      fn();
    };
  }
}
