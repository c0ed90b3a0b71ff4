type Waiter = { kind: 'read' | 'write'; grant: () => void };

/**
 * Async reader/writer lock with FIFO fairness: a queued writer blocks readers
 * that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private queue: Waiter[] = [];

  async acquireRead(): Promise<void> {
    if (!this.writer && this.queue.length === 0) {
      this.readers++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        kind: 'read',
        grant: () => {
          this.readers++;
          resolve();
        },
      });
    });
  }

  async acquireWrite(): Promise<void> {
    if (!this.writer && this.readers === 0 && this.queue.length === 0) {
      this.writer = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        kind: 'write',
        grant: () => {
          this.writer = true;
          resolve();
        },
      });
    });
  }

  releaseRead(): void {
    if (this.readers === 0) {
      throw new Error('releaseRead called without a held read lock');
    }
    this.readers--;
    this.drain();
  }

  releaseWrite(): void {
    if (!this.writer) {
      throw new Error('releaseWrite called without a held write lock');
    }
    this.writer = false;
    this.drain();
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  get state(): { readers: number; writer: boolean; waiting: number } {
    return { readers: this.readers, writer: this.writer, waiting: this.queue.length };
  }

  private drain(): void {
    while (this.queue.length > 0 && !this.writer) {
      const head = this.queue[0];
      if (head.kind === 'write') {
        if (this.readers > 0) return;
        this.queue.shift();
        head.grant();
        return;
      }
      this.queue.shift();
      head.grant();
    }
  }
}
