/**
 * Mutex - FIFO async lock
 *
 * Waiters are granted the lock in the order they called acquire().
 */
export type Release = () => void;

export class Mutex {
  private locked = false;
  private waiters: Array<(release: Release) => void> = [];

  /**
   * Resolve with a release function once the lock is held
   */
  acquire(): Promise<Release> {
    return new Promise<Release>((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve(this.createRelease());
      } else {
        this.waiters.push(resolve);
      }
    });
  }

  /**
   * Run fn while holding the lock
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand over without unlocking so no newcomer can jump the queue
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
