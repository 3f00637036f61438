import { describe, it, expect } from 'vitest';
import { SlidingWindowLimiter } from '../../src/index.js';
import { ManualClock } from '../helpers/manual-clock.js';

describe('SlidingWindowLimiter', () => {
  it('admits up to the limit within a window', () => {
    const clock = new ManualClock();
    const limiter = new SlidingWindowLimiter({ limit: 3, windowMs: 1000, clock });

    expect(limiter.consume('a').allowed).toBe(true);
    expect(limiter.consume('a').allowed).toBe(true);
    const third = limiter.consume('a');
    expect(third).toEqual({ allowed: true, current: 3, limit: 3, remaining: 0, resetMs: 1000 });

    const fourth = limiter.consume('a');
    expect(fourth.allowed).toBe(false);
    expect(fourth.current).toBe(3);
  });

  it('slides: admissions expire one window after they happened', () => {
    const clock = new ManualClock();
    const limiter = new SlidingWindowLimiter({ limit: 2, windowMs: 1000, clock });

    limiter.consume('a');
    clock.advance(600);
    limiter.consume('a');
    expect(limiter.consume('a').allowed).toBe(false);

    clock.advance(400);
    const result = limiter.consume('a');
    expect(result.allowed).toBe(true);
    expect(result.current).toBe(2);
    expect(result.resetMs).toBe(600);
  });

  it('charges a cost all-or-nothing', () => {
    const limiter = new SlidingWindowLimiter({ limit: 10, windowMs: 1000, clock: new ManualClock() });

    expect(limiter.consume('a', 8).allowed).toBe(true);
    const refused = limiter.consume('a', 3);
    expect(refused.allowed).toBe(false);
    expect(refused.current).toBe(8);
    expect(limiter.consume('a', 2).allowed).toBe(true);
  });

  it('tracks keys independently', () => {
    const limiter = new SlidingWindowLimiter({ limit: 1, windowMs: 1000, clock: new ManualClock() });
    expect(limiter.consume('a').allowed).toBe(true);
    expect(limiter.consume('b').allowed).toBe(true);
    expect(limiter.consume('a').allowed).toBe(false);
  });

  it('peek does not record', () => {
    const limiter = new SlidingWindowLimiter({ limit: 1, windowMs: 1000, clock: new ManualClock() });
    expect(limiter.peek('a')).toMatchObject({ allowed: true, current: 0 });
    expect(limiter.peek('a')).toMatchObject({ allowed: true, current: 0 });
    limiter.consume('a');
    expect(limiter.peek('a')).toMatchObject({ allowed: false, current: 1, remaining: 0 });
  });

  it('cleanup removes keys idle for two windows', () => {
    const clock = new ManualClock();
    const limiter = new SlidingWindowLimiter({ limit: 5, windowMs: 1000, clock });

    limiter.consume('old');
    clock.advance(1500);
    limiter.consume('recent');
    clock.advance(600);

    expect(limiter.cleanup()).toBe(1);
    expect(limiter.size).toBe(1);
    expect(limiter.consume('recent').remaining).toBe(3);
  });

  it('reset forgets a key', () => {
    const limiter = new SlidingWindowLimiter({ limit: 1, windowMs: 1000, clock: new ManualClock() });
    limiter.consume('a');
    limiter.reset('a');
    expect(limiter.consume('a').allowed).toBe(true);
  });
});
