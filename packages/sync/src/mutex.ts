export type Release = () => void;

/**
 * FIFO async lock. Holders are granted in the order they called acquire().
 */
export class Mutex {
  private locked = false;
  private readonly queue: (() => void)[] = [];

  acquire(): Promise<Release> {
    return new Promise<Release>((resolve) => {
      const grant = () => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (this.locked) {
        this.queue.push(grant);
      } else {
        grant();
      }
    });
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
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

  pending(): number {
    return this.queue.length;
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}

export function createMutex(): Mutex {
  return new Mutex();
}
