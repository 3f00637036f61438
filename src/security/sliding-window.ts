/**
 * Synchronous sliding-window rate limiter.
 *
 * Keeps a log of admission timestamps per key and counts those inside the
 * last `windowMs`. Runs inline on the caller's stack, so the per-key ledger
 * is only ever touched by its owning gate.
 *
 * @module security/sliding-window
 */

import { systemClock, type Clock } from '../core/clock.js';

// =============================================================================
// Types
// =============================================================================

interface WindowEntry {
  /** Admission timestamps, oldest first */
  timestamps: number[];
}

export interface SlidingWindowOptions {
  /** Maximum admissions per window */
  readonly limit: number;

  /** Window length in milliseconds */
  readonly windowMs: number;

  readonly clock?: Clock | undefined;
}

/**
 * Result of a rate limit check.
 */
export interface RateLimitResult {
  /** Whether the request was admitted */
  readonly allowed: boolean;

  /** Admissions in the window after this check */
  readonly current: number;

  readonly limit: number;

  readonly remaining: number;

  /** Milliseconds until the oldest admission leaves the window */
  readonly resetMs: number;
}

// =============================================================================
// SlidingWindowLimiter
// =============================================================================

/**
 * @example
 * ```typescript
 * const limiter = new SlidingWindowLimiter({ limit: 100, windowMs: 1000 });
 * if (!limiter.consume(fingerprint).allowed) {
 *   return; // drop
 * }
 * ```
 */
export class SlidingWindowLimiter {
  private readonly entries = new Map<string, WindowEntry>();
  private readonly clock: Clock;

  readonly limit: number;
  readonly windowMs: number;

  constructor(options: SlidingWindowOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Admits `cost` units for `key` if they fit in the window.
   * A refused request records nothing.
   */
  consume(key: string, cost = 1): RateLimitResult {
    const now = this.clock.now();
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { timestamps: [] };
      this.entries.set(key, entry);
    }

    this.prune(entry, now);

    const allowed = entry.timestamps.length + cost <= this.limit;
    if (allowed) {
      for (let i = 0; i < cost; i++) {
        entry.timestamps.push(now);
      }
    }

    const current = entry.timestamps.length;
    return {
      allowed,
      current,
      limit: this.limit,
      remaining: Math.max(0, this.limit - current),
      resetMs: this.resetMs(entry, now),
    };
  }

  /**
   * Reports the state for `key` without recording anything.
   */
  peek(key: string): RateLimitResult {
    const now = this.clock.now();
    const entry = this.entries.get(key);
    const current = entry ? this.countActive(entry, now) : 0;
    return {
      allowed: current < this.limit,
      current,
      limit: this.limit,
      remaining: Math.max(0, this.limit - current),
      resetMs: entry ? this.resetMs(entry, now) : this.windowMs,
    };
  }

  reset(key: string): void {
    this.entries.delete(key);
  }

  /**
   * Removes entries with no admissions in the last two windows.
   *
   * @returns number of entries removed
   */
  cleanup(): number {
    const cutoff = this.clock.now() - this.windowMs * 2;
    let removed = 0;
    for (const [key, entry] of this.entries) {
      const hasRecentActivity = entry.timestamps.some((t) => t > cutoff);
      if (!hasRecentActivity) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  private prune(entry: WindowEntry, now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < entry.timestamps.length && (entry.timestamps[drop] ?? 0) <= cutoff) {
      drop++;
    }
    if (drop > 0) entry.timestamps.splice(0, drop);
  }

  private countActive(entry: WindowEntry, now: number): number {
    const cutoff = now - this.windowMs;
    return entry.timestamps.filter((t) => t > cutoff).length;
  }

  private resetMs(entry: WindowEntry, now: number): number {
    const oldest = entry.timestamps[0];
    if (oldest === undefined) return this.windowMs;
    return Math.max(0, oldest + this.windowMs - now);
  }
}
