/**
 * Reconnection backoff for one transport.
 *
 * Tiered delays by consecutive failure count with no attempt limit: a peer
 * that sleeps and wakes must always be picked up again.
 *
 * @module link/reconnect
 */

import { EventEmitter } from 'node:events';

import type { Clock, ScheduledTimer } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { BACKOFF_TIERS } from './types.js';

/**
 * Backoff delay after `failures` consecutive failures.
 * 1s for 1-5, 3s for 6-15, 10s from 16 on.
 */
export function backoffDelay(failures: number): number {
  const k = Math.max(1, Math.floor(failures));
  for (const tier of BACKOFF_TIERS) {
    if (k <= tier.upTo) return tier.delayMs;
  }
  // Unreachable: the last tier is unbounded.
  return BACKOFF_TIERS[BACKOFF_TIERS.length - 1]?.delayMs ?? 10000;
}

/**
 * One reconnection attempt. May throw or reject; either counts as a failure.
 */
export type ReconnectAttempt = () => void | Promise<void>;

export interface ReconnectionSchedulerOptions {
  readonly clock: Clock;
  readonly attempt: ReconnectAttempt;
  readonly logger?: Logger | undefined;
  readonly delayFor?: ((failures: number) => number) | undefined;
}

export interface ReconnectionEvents {
  /** Emitted when an attempt is scheduled */
  scheduled: [failures: number, delayMs: number];
}

/**
 * @example
 * ```typescript
 * const scheduler = new ReconnectionScheduler({ clock, attempt: () => transport.dial() });
 * socket.on('close', () => scheduler.recordFailure());
 * transport.on('active', () => scheduler.reset());
 * ```
 */
export class ReconnectionScheduler extends EventEmitter<ReconnectionEvents> {
  private failures = 0;
  private pending: ScheduledTimer | null = null;
  private suppressed = false;
  private readonly logger: Logger;
  private readonly delayFor: (failures: number) => number;

  constructor(private readonly options: ReconnectionSchedulerOptions) {
    super();
    this.logger = options.logger ?? silentLogger;
    this.delayFor = options.delayFor ?? backoffDelay;
  }

  /**
   * Counts a failure and schedules the next attempt.
   *
   * @returns the scheduled delay, or null while suppressed
   */
  recordFailure(): number | null {
    this.failures++;
    return this.scheduleNext();
  }

  /**
   * Schedules an attempt for the current failure count without counting a
   * new failure. Replaces any pending attempt.
   */
  scheduleNext(): number | null {
    if (this.suppressed) return null;

    this.cancelPending();
    const delayMs = this.delayFor(this.failures);
    this.pending = this.options.clock.schedule(() => {
      this.pending = null;
      this.run();
    }, delayMs);

    this.emit('scheduled', this.failures, delayMs);
    this.logger.debug('reconnect scheduled', { failures: this.failures, delayMs });
    return delayMs;
  }

  /**
   * Peer became available: skip the remaining backoff and attempt now.
   */
  retryNow(): void {
    if (this.suppressed) return;
    this.cancelPending();
    this.run();
  }

  /**
   * Successful handshake: failure counter back to zero.
   */
  reset(): void {
    this.failures = 0;
    this.cancelPending();
  }

  /**
   * Cancels any pending attempt and refuses to schedule until resumed.
   */
  suppress(): void {
    this.suppressed = true;
    this.cancelPending();
  }

  resume(): void {
    this.suppressed = false;
  }

  isSuppressed(): boolean {
    return this.suppressed;
  }

  isPending(): boolean {
    return this.pending !== null;
  }

  getFailureCount(): number {
    return this.failures;
  }

  private run(): void {
    let outcome: void | Promise<void>;
    try {
      outcome = this.options.attempt();
    } catch (err) {
      this.onAttemptError(err);
      return;
    }

    if (outcome instanceof Promise) {
      void outcome.catch((err: unknown) => this.onAttemptError(err));
    }
  }

  private onAttemptError(err: unknown): void {
    this.logger.debug('reconnect attempt failed', {
      error: err instanceof Error ? err : String(err),
    });
    this.recordFailure();
  }

  private cancelPending(): void {
    this.pending?.cancel();
    this.pending = null;
  }
}
