/**
 * Hit Counter
 *
 * Per-path visit counts shown in directory listings.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { Mutex } from './lock.js';
import { DEFAULT_HIT_DELAY_MS } from './types.js';

export interface HitCounterConfig {
  /**
   * Delay held inside the lock on every increment. Because one lock covers
   * all paths, this caps recording at roughly 1000 / delayMs hits per second
   * across the whole server. 0 disables the wait.
   */
  delayMs: number;
}

export class HitCounter {
  private counts: Map<string, number> = new Map();
  private readonly lock = new Mutex();

  constructor(private readonly config: HitCounterConfig = { delayMs: DEFAULT_HIT_DELAY_MS }) {}

  /**
   * Increment the count for `path`, returning the new value.
   */
  record(path: string): Promise<number> {
    return this.lock.runExclusive(async () => {
      const current = this.counts.get(path) ?? 0;
      if (this.config.delayMs > 0) {
        await sleep(this.config.delayMs);
      }
      const next = current + 1;
      this.counts.set(path, next);
      return next;
    });
  }

  /** Current count; readers do not wait for the lock */
  get(path: string): number {
    return this.counts.get(path) ?? 0;
  }

  snapshot(): Map<string, number> {
    return new Map(this.counts);
  }
}
