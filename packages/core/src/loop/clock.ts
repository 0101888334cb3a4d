/**
 * Clock and sleep abstractions for the event loop.
 *
 * The loop never reads `process.hrtime` or blocks the thread directly —
 * it always goes through a Clock and a Sleeper. This keeps the engine
 * environment-agnostic and fully testable with deterministic time.
 */

/** Nanoseconds in one second. */
export const NANOS_PER_SECOND = 1_000_000_000;

/** Nanoseconds in one millisecond. */
export const NANOS_PER_MILLI = 1_000_000;

/** Monotonic time source. */
export interface Clock {
  /** Current time in nanoseconds. Never decreases. */
  now(): number;
}

/** Blocking sleep primitive. */
export interface Sleeper {
  /**
   * Block the calling thread for up to `ns` nanoseconds, rounded down to
   * the primitive's own granularity. Never sleeps longer than asked.
   * Non-positive durations return immediately.
   */
  sleep(ns: number): void;
}

/** Whole milliseconds contained in a nanosecond span, rounded down. */
export function nanosToMillis(ns: number): number {
  return Math.floor(ns / NANOS_PER_MILLI);
}

/** Convert a nanosecond span to fractional seconds. */
export function nanosToSeconds(ns: number): number {
  return ns / NANOS_PER_SECOND;
}
