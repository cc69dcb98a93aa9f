type Waiter = { write: boolean; resolve: () => void };

/**
 * Async read/write lock. Readers share, writers are exclusive, and a
 * queued writer holds back readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.readers--;
      this.drain();
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  private acquire(write: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canEnter(write)) {
      this.enter(write);
      return Promise.resolve();
    }
    return new Promise((resolve) => this.queue.push({ write, resolve }));
  }

  private canEnter(write: boolean): boolean {
    return write ? !this.writing && this.readers === 0 : !this.writing;
  }

  private enter(write: boolean): void {
    if (write) {
      this.writing = true;
    } else {
      this.readers++;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canEnter(next.write)) return;
      this.queue.shift();
      this.enter(next.write);
      next.resolve();
      if (next.write) return;
    }
  }
}
