/**
 * Sliding-window rate limiter.
 *
 * Each key keeps the ordered timestamps of its admissions inside the trailing
 * window. Entries at or beyond the window edge are pruned on every check, so
 * there is no bucket boundary where two full bursts can land back to back.
 * Checks are synchronous: one key's window is never observed half-updated.
 */

import { createLogger } from '../logger.js';

const logger = createLogger('rate-limiter');

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RateLimiterOptions {
  /** Maximum admissions per key inside one window. */
  capacity: number;
  windowMs: number;
  /** Clock override, used by tests. */
  now?: () => number;
  /** Label used in logs to tell limiters apart. */
  name?: string;
}

export interface RateWindow {
  key: string;
  timestamps: number[];
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  limit: number;
  /** When the oldest admission leaves the window. */
  reset_at: string;
  key: string;
}

export const REQUESTS_PER_MINUTE = 120;
export const MESSAGES_PER_MINUTE = 30;
export const ONE_MINUTE_MS = 60_000;

// ─── Rate Limiter ───────────────────────────────────────────────────────────

export class RateLimiter {
  private windows: Map<string, RateWindow> = new Map();
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly name: string;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`Rate limiter capacity must be a positive integer, got ${options.capacity}`);
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`Rate limiter window must be positive, got ${options.windowMs}`);
    }
    this.capacity = options.capacity;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
    this.name = options.name ?? 'default';
  }

  /**
   * Admit or deny one event for a key. Admission records the timestamp.
   */
  check(key: string): boolean {
    return this.consume(key).allowed;
  }

  /**
   * Same as check, with remaining quota and reset time.
   */
  consume(key: string): RateLimitResult {
    const now = this.now();
    const window = this.getOrCreateWindow(key);
    this.pruneWindow(window, now);

    if (window.timestamps.length >= this.capacity) {
      logger.debug({ limiter: this.name, key }, 'Rate limit reached');
      return {
        allowed: false,
        remaining: 0,
        limit: this.capacity,
        reset_at: new Date(window.timestamps[0] + this.windowMs).toISOString(),
        key,
      };
    }

    window.timestamps.push(now);
    return {
      allowed: true,
      remaining: this.capacity - window.timestamps.length,
      limit: this.capacity,
      reset_at: new Date(window.timestamps[0] + this.windowMs).toISOString(),
      key,
    };
  }

  /**
   * Number of admissions currently inside the window for a key.
   */
  count(key: string): number {
    const window = this.windows.get(key);
    if (!window) return 0;
    this.pruneWindow(window, this.now());
    return window.timestamps.length;
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  /**
   * Drop keys whose windows have emptied. Returns how many were dropped.
   */
  prune(): number {
    const now = this.now();
    let dropped = 0;
    for (const [key, window] of this.windows) {
      this.pruneWindow(window, now);
      if (window.timestamps.length === 0) {
        this.windows.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.windows.size;
  }

  get limit(): number {
    return this.capacity;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private getOrCreateWindow(key: string): RateWindow {
    let window = this.windows.get(key);
    if (!window) {
      window = { key, timestamps: [] };
      this.windows.set(key, window);
    }
    return window;
  }

  private pruneWindow(window: RateWindow, now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < window.timestamps.length && window.timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) window.timestamps.splice(0, expired);
  }
}
