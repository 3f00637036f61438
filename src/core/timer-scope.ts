/**
 * Owner-tagged timer group.
 *
 * A scope belongs to one connection. Its timers fire only while the scope is
 * alive; disposing the scope cancels everything still pending and turns any
 * callback that races the cancellation into a no-op.
 *
 * @module core/timer-scope
 */

import type { Clock, ScheduledTimer } from './clock.js';

export class TimerScope {
  private readonly timers = new Set<ScheduledTimer>();
  private disposed = false;

  constructor(
    private readonly clock: Clock,
    readonly owner: string,
  ) {}

  /**
   * Runs `callback` once after `delayMs`, unless the scope is disposed first.
   */
  after(delayMs: number, callback: () => void): ScheduledTimer {
    if (this.disposed) {
      return { cancel: () => {} };
    }

    let inner: ScheduledTimer | null = null;
    const handle: ScheduledTimer = {
      cancel: () => {
        inner?.cancel();
        this.timers.delete(handle);
      },
    };

    inner = this.clock.schedule(() => {
      this.timers.delete(handle);
      if (this.disposed) return;
      callback();
    }, delayMs);

    this.timers.add(handle);
    return handle;
  }

  /**
   * Runs `callback` every `intervalMs` until cancelled or disposed.
   */
  every(intervalMs: number, callback: () => void): ScheduledTimer {
    let current: ScheduledTimer | null = null;
    let cancelled = false;

    const tick = (): void => {
      current = this.after(intervalMs, () => {
        if (cancelled) return;
        callback();
        if (!cancelled) tick();
      });
    };
    tick();

    return {
      cancel: () => {
        cancelled = true;
        current?.cancel();
      },
    };
  }

  /**
   * Cancels every pending timer but keeps the scope usable.
   */
  cancelAll(): void {
    for (const timer of [...this.timers]) {
      timer.cancel();
    }
    this.timers.clear();
  }

  /**
   * Cancels every pending timer and refuses new ones.
   */
  dispose(): void {
    this.cancelAll();
    this.disposed = true;
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Number of timers currently pending.
   */
  get pending(): number {
    return this.timers.size;
  }
}
