/**
 * FIFO mutual exclusion for a single document's commit path.
 *
 * Waiters are served in arrival order. `runExclusive` releases the lock
 * whether the critical section returns or throws.
 */
export class CommitLock {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  acquire(): Promise<() => void> {
    return new Promise(resolve => {
      const grant = (): void => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (!this.locked) {
        grant();
      } else {
        this.waiters.push(grant);
      }
    });
  }

  async runExclusive<T>(criticalSection: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await criticalSection();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
