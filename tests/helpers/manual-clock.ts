import type { Clock, ScheduledTimer } from '../../src/index.js';

interface Entry {
  readonly id: number;
  readonly at: number;
  readonly callback: () => void;
}

/**
 * Clock that only moves when told to. Timers due within an advance() run in
 * due order, including timers scheduled by other timers.
 */
export class ManualClock implements Clock {
  private current: number;
  private seq = 0;
  private entries: Entry[] = [];

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  schedule(callback: () => void, delayMs: number): ScheduledTimer {
    const entry: Entry = { id: ++this.seq, at: this.current + Math.max(0, delayMs), callback };
    this.entries.push(entry);
    return {
      cancel: () => {
        this.entries = this.entries.filter((e) => e !== entry);
      },
    };
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.entries = this.entries.filter((e) => e !== next);
      this.current = next.at;
      next.callback();
    }
    this.current = target;
  }

  get pending(): number {
    return this.entries.length;
  }

  private nextDue(limit: number): Entry | undefined {
    let best: Entry | undefined;
    for (const entry of this.entries) {
      if (entry.at > limit) continue;
      if (!best || entry.at < best.at || (entry.at === best.at && entry.id < best.id)) best = entry;
    }
    return best;
  }
}
