import { describe, expect, it } from 'vitest';
import { formatDuration, TimeInterval } from './time.js';

describe('formatDuration', () => {
  it('should format hours, minutes and seconds', () => {
    expect(formatDuration(3_661_000)).toBe('1h 1m 1s');
  });

  it('should drop hours under an hour', () => {
    expect(formatDuration(61_000)).toBe('1m 1s');
  });

  it('should keep only seconds under a minute', () => {
    expect(formatDuration(1_000)).toBe('1s');
    expect(formatDuration(999)).toBe('0s');
  });

  it('should show zero minutes when hours are present', () => {
    expect(formatDuration(7_205_000)).toBe('2h 0m 5s');
  });
});

describe('TimeInterval', () => {
  it('should be open until stopped', () => {
    let now = 100;
    const interval = new TimeInterval(() => now);

    expect(interval.elapsed()).toBeUndefined();
    expect(interval.isStopped()).toBe(false);

    now = 350;
    expect(interval.stop()).toBe(250);
    expect(interval.elapsed()).toBe(250);
    expect(interval.isStopped()).toBe(true);
  });

  it('should measure against the real clock by default', () => {
    const interval = new TimeInterval();
    expect(interval.stop()).toBeGreaterThanOrEqual(0);
  });
});
