/**
 * Promise-based read/write lock.
 *
 * Any number of readers may hold the lock together; a writer waits for them to
 * drain and holds it alone. Waiting writers block new readers, so a profile
 * swap is not starved by a steady stream of sessions.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Array<{ write: boolean; grant: () => void }> = [];

  /**
   * Run `fn` holding a shared lock.
   */
  async read<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.drain();
    }
  }

  /**
   * Run `fn` holding the lock exclusively.
   */
  async write<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.writing = false;
      this.drain();
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  private acquire(write: boolean): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(write)) {
      this.take(write);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ write, grant: resolve });
    });
  }

  private canGrant(write: boolean): boolean {
    return write ? !this.writing && this.readers === 0 : !this.writing;
  }

  private take(write: boolean): void {
    if (write) {
      this.writing = true;
    } else {
      this.readers += 1;
    }
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.write)) {
        return;
      }
      this.queue.shift();
      this.take(next.write);
      next.grant();
      if (next.write) {
        return;
      }
    }
  }
}
