/**
 * Monotonic time intervals and duration formatting
 */

export type Clock = () => number;

const monotonicClock: Clock = () => performance.now();

/**
 * Interval opened at construction and closed by stop()
 */
export class TimeInterval {
  private readonly startTime: number;
  private endTime: number | undefined;

  constructor(private readonly clock: Clock = monotonicClock) {
    this.startTime = clock();
  }

  /**
   * Close the interval and return its length in milliseconds
   */
  stop(): number {
    this.endTime = this.clock();
    return this.endTime - this.startTime;
  }

  /**
   * Length in milliseconds, undefined while the interval is open
   */
  elapsed(): number | undefined {
    return this.endTime === undefined ? undefined : this.endTime - this.startTime;
  }

  isStopped(): boolean {
    return this.endTime !== undefined;
  }
}

/**
 * Format a duration as `1h 1m 1s`, `1m 1s` or `1s`
 */
export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.floor(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}
