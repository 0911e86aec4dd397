/**
 * In-Memory Rate Limiter
 *
 * Tracks admission timestamps per client identity over a sliding window.
 */

import { DEFAULT_MAX_REQUESTS, DEFAULT_WINDOW_MS } from './types.js';

export interface RateLimitConfig {
  /** Maximum admissions per identity per window */
  maxRequests: number;
  /** Window length in milliseconds */
  windowMs: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxRequests: DEFAULT_MAX_REQUESTS,
  windowMs: DEFAULT_WINDOW_MS,
};

export class SlidingWindowRateLimiter {
  private clients: Map<string, number[]> = new Map();

  constructor(private readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT) {
    if (config.maxRequests < 1 || config.windowMs <= 0) {
      throw new Error('Rate limit requires maxRequests >= 1 and windowMs > 0');
    }
  }

  /**
   * Admit or reject one request from `identity` at time `now` (ms).
   *
   * Prune, compare and append happen without yielding, so concurrent
   * connections can never push more than `maxRequests` through a window.
   * A rejection leaves the stored timestamps as they were after pruning.
   */
  allow(identity: string, now: number = Date.now()): boolean {
    const recent = (this.clients.get(identity) ?? []).filter(
      (t) => now - t < this.config.windowMs
    );
    this.clients.set(identity, recent);

    if (recent.length < this.config.maxRequests) {
      recent.push(now);
      return true;
    }
    return false;
  }

  /**
   * Get stored timestamps for an identity
   */
  getState(identity: string): readonly number[] | undefined {
    return this.clients.get(identity);
  }

  /**
   * Get statistics
   */
  stats(): { totalClients: number; totalRequests: number } {
    let totalRequests = 0;
    for (const timestamps of this.clients.values()) {
      totalRequests += timestamps.length;
    }
    return {
      totalClients: this.clients.size,
      totalRequests,
    };
  }
}
