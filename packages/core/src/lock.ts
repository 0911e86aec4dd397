/**
 * Async mutual exclusion primitives
 *
 * JavaScript never interleaves synchronous code, but a critical section that
 * awaits (a timer, a file read) can. These keep such sections ordered.
 */

type Waiter = () => void;

export class Semaphore {
  private holders = 0;
  private queue: Waiter[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get active(): number {
    return this.holders;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /**
   * Wait for a slot. The returned function releases it; calling it more
   * than once has no further effect.
   */
  async acquire(): Promise<() => void> {
    if (this.holders < this.limit) {
      this.holders++;
    } else {
      // The releasing holder hands its slot straight to us
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.holders--;
      }
    };
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

export class Mutex {
  private readonly semaphore = new Semaphore(1);

  get locked(): boolean {
    return this.semaphore.active > 0;
  }

  /** Run `fn` once every earlier section has finished (FIFO) */
  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.semaphore.run(fn);
  }
}
