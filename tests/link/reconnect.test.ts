import { describe, it, expect } from 'vitest';
import { ReconnectionScheduler, backoffDelay } from '../../src/index.js';
import { ManualClock } from '../helpers/manual-clock.js';

const flushMicrotasks = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('backoffDelay', () => {
  it('follows the 1s / 3s / 10s tiers', () => {
    expect([1, 5, 6, 15, 16, 1000].map(backoffDelay)).toEqual([1000, 1000, 3000, 3000, 10000, 10000]);
  });

  it('treats zero and negative counts as the first tier', () => {
    expect(backoffDelay(0)).toBe(1000);
    expect(backoffDelay(-3)).toBe(1000);
  });
});

describe('ReconnectionScheduler', () => {
  it('schedules an attempt after the tiered delay', () => {
    const clock = new ManualClock();
    let attempts = 0;
    const scheduler = new ReconnectionScheduler({ clock, attempt: () => void attempts++ });
    const scheduled: Array<[number, number]> = [];
    scheduler.on('scheduled', (failures, delayMs) => scheduled.push([failures, delayMs]));

    expect(scheduler.recordFailure()).toBe(1000);
    expect(scheduler.isPending()).toBe(true);
    clock.advance(999);
    expect(attempts).toBe(0);
    clock.advance(1);
    expect(attempts).toBe(1);
    expect(scheduled).toEqual([[1, 1000]]);
  });

  it('never gives up: a throwing attempt schedules the next one', () => {
    const clock = new ManualClock();
    let attempts = 0;
    const scheduler = new ReconnectionScheduler({
      clock,
      attempt: () => {
        attempts++;
        throw new Error('refused');
      },
    });

    scheduler.recordFailure();
    clock.advance(5000);
    expect(attempts).toBe(5);
    expect(scheduler.getFailureCount()).toBe(6);

    clock.advance(3000);
    expect(attempts).toBe(6);
    expect(scheduler.getFailureCount()).toBe(7);
  });

  it('counts a rejected attempt as a failure', async () => {
    const clock = new ManualClock();
    const scheduler = new ReconnectionScheduler({
      clock,
      attempt: () => Promise.reject(new Error('timeout')),
    });

    scheduler.retryNow();
    await flushMicrotasks();

    expect(scheduler.getFailureCount()).toBe(1);
    expect(scheduler.isPending()).toBe(true);
  });

  it('retryNow skips the remaining backoff', () => {
    const clock = new ManualClock();
    let attempts = 0;
    const scheduler = new ReconnectionScheduler({ clock, attempt: () => void attempts++ });

    for (let i = 0; i < 20; i++) scheduler.recordFailure();
    scheduler.retryNow();

    expect(attempts).toBe(1);
    expect(scheduler.isPending()).toBe(false);
  });

  it('reset clears the counter and any pending attempt', () => {
    const clock = new ManualClock();
    let attempts = 0;
    const scheduler = new ReconnectionScheduler({ clock, attempt: () => void attempts++ });

    scheduler.recordFailure();
    scheduler.recordFailure();
    scheduler.reset();
    clock.advance(10000);

    expect(attempts).toBe(0);
    expect(scheduler.getFailureCount()).toBe(0);
    expect(scheduler.recordFailure()).toBe(1000);
  });

  it('suppress cancels and refuses scheduling until resumed', () => {
    const clock = new ManualClock();
    let attempts = 0;
    const scheduler = new ReconnectionScheduler({ clock, attempt: () => void attempts++ });

    scheduler.recordFailure();
    scheduler.suppress();
    expect(scheduler.isSuppressed()).toBe(true);
    expect(scheduler.recordFailure()).toBeNull();
    scheduler.retryNow();
    clock.advance(10000);
    expect(attempts).toBe(0);

    scheduler.resume();
    scheduler.retryNow();
    expect(attempts).toBe(1);
  });

  it('uses a custom delay function', () => {
    const clock = new ManualClock();
    const scheduler = new ReconnectionScheduler({ clock, attempt: () => {}, delayFor: (k) => k * 10 });
    scheduler.recordFailure();
    expect(scheduler.recordFailure()).toBe(20);
  });
});
