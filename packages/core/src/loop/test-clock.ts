/**
 * TestClock — deterministic clock and sleeper for event loop tests.
 *
 * Time moves only when a test advances it, or when the loop sleeps.
 * No real timers or blocking are involved — tests are instant and
 * deterministic.
 */

import { NANOS_PER_MILLI } from "./clock.js";
import type { Clock, Sleeper } from "./clock.js";

/**
 * A clock that advances time only when explicitly told to.
 * Sleeping jumps the clock forward by the requested duration.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const loop = createEventLoop(window, { clock, sleeper: clock });
 *
 * loop.nextEvent(); // render at t=0
 * clock.advanceMillis(5); // the caller spent 5ms drawing
 * loop.nextEvent(); // afterRender
 * ```
 */
export class TestClock implements Clock, Sleeper {
  private currentTime: number;

  /** Durations passed to `sleep()`, in nanoseconds, in call order. */
  readonly sleeps: number[] = [];

  /** @param startNs - Initial reading in nanoseconds. Defaults to 0. */
  constructor(startNs = 0) {
    this.currentTime = startNs;
  }

  /** Current time in nanoseconds. */
  now(): number {
    return this.currentTime;
  }

  /** Move time forward by `ns` nanoseconds. */
  advance(ns: number): void {
    if (ns < 0) {
      throw new Error(`TestClock cannot move backwards (advance by ${ns}ns)`);
    }
    this.currentTime += ns;
  }

  /** Move time forward by `ms` milliseconds. */
  advanceMillis(ms: number): void {
    this.advance(ms * NANOS_PER_MILLI);
  }

  /** Records the sleep and advances the clock by exactly its duration. */
  sleep(ns: number): void {
    this.sleeps.push(ns);
    if (ns > 0) {
      this.advance(ns);
    }
  }
}
