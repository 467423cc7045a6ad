/**
 * FIFO async mutex.
 *
 * Callers of `runExclusive` queue behind each other; the next waiter is
 * released only after the previous task settles, whether it resolved or threw.
 */

type Release = () => void;

export class AsyncMutex {
  private readonly waiters: Array<(release: Release) => void> = [];

  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(): Promise<Release> {
    return new Promise<Release>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
        return;
      }
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next(this.createRelease());
        return;
      }
      this.locked = false;
    };
  }
}
