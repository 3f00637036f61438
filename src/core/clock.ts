/**
 * Time source abstraction.
 *
 * Every wait in the link layer (handshake timeout, batch window, heartbeat
 * tick, reconnection backoff) goes through a {@link Clock}, so tests can drive
 * time deterministically.
 *
 * @module core/clock
 */

/**
 * Handle for a scheduled callback.
 */
export interface ScheduledTimer {
  cancel(): void;
}

export interface Clock {
  /** Current time in milliseconds since the epoch */
  now(): number;

  /** Runs `callback` once after `delayMs` */
  schedule(callback: () => void, delayMs: number): ScheduledTimer;
}

/**
 * Clock backed by `Date.now` and `setTimeout`.
 *
 * The globals are looked up on every call rather than captured, which keeps
 * it compatible with fake timers installed after module load.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return {
      cancel: () => clearTimeout(handle),
    };
  },
};

/**
 * Converts milliseconds since the epoch to whole seconds, the unit used by
 * `timestamp` fields on the wire.
 */
export function epochSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}
