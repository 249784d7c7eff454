import { describe, it, expect } from 'vitest';
import { TimerClock } from '../../src/timing/timerClock';

describe('TimerClock', () => {
  it('yields 60 ticks per second', () => {
    expect(new TimerClock().advance(1000)).toBe(60);
  });

  it('carries remainders across uneven steps', () => {
    const c = new TimerClock();
    const ticks = [10, 10, 10, 10, 10, 10].map((ms) => c.advance(ms));
    expect(ticks).toEqual([0, 1, 0, 1, 1, 0]);
  });

  it('ticks once the full period has elapsed', () => {
    const c = new TimerClock(1);
    expect(c.advance(999)).toBe(0);
    expect(c.advance(1)).toBe(1);
  });

  it('ignores non-positive input and can be reset', () => {
    const c = new TimerClock();
    expect(c.advance(0)).toBe(0);
    expect(c.advance(-5)).toBe(0);
    expect(c.advance(Number.NaN)).toBe(0);
    c.advance(16);
    c.reset();
    expect(c.advance(1)).toBe(0);
  });
});
