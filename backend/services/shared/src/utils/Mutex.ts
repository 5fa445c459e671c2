// backend/services/shared/src/utils/Mutex.ts
/**
 * Cooperative mutual exclusion for async sections.
 * Waiters are served FIFO; release is idempotent.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  public acquire(): Promise<() => void> {
    const prev = this.tail;
    let releaseNext: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });

    return prev.then(() => {
      let released = false;
      return () => {
        if (released) return;
        released = true;
        releaseNext();
      };
    });
  }

  public async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
