/**
 * AdFeed — Async Mutex
 *
 * In-process mutual exclusion for async sections. The poll cycle uses
 * tryAcquire (skip when held); config updates queue with runExclusive.
 */

export type Release = () => void;

export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Take the lock if it is free. Returns null when it is held.
   */
  tryAcquire(): Release | null {
    if (this.locked) return null;
    this.locked = true;
    return this.createRelease();
  }

  /**
   * Wait for the lock. Waiters are served in arrival order.
   */
  acquire(): Promise<Release> {
    const release = this.tryAcquire();
    if (release) return Promise.resolve(release);

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;

    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter; the lock never reads as free in between
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
