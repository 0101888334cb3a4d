/**
 * Node.js clock and sleeper — the production time sources for the loop.
 *
 * See `TestClock` for tests.
 */

import { nanosToMillis } from "./clock.js";
import type { Clock, Sleeper } from "./clock.js";

/**
 * A clock backed by `process.hrtime.bigint()`.
 *
 * Readings are relative to the moment the clock was created so they stay
 * well inside the safe integer range of a `number`.
 *
 * @example
 * ```ts
 * const loop = createEventLoop(window, { clock: new HrtimeClock() });
 * ```
 */
export class HrtimeClock implements Clock {
  private readonly origin: bigint;

  constructor() {
    this.origin = process.hrtime.bigint();
  }

  /** Nanoseconds elapsed since this clock was created. */
  now(): number {
    return Number(process.hrtime.bigint() - this.origin);
  }
}

/**
 * Blocks the calling thread with `Atomics.wait` on a private cell.
 *
 * Nothing ever notifies the cell, so every wait runs to its timeout.
 * Durations are rounded down to whole milliseconds; a span shorter than
 * one millisecond returns at once. While it waits, no timers or I/O
 * callbacks run on this thread.
 */
export class AtomicsSleeper implements Sleeper {
  private readonly cell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));

  sleep(ns: number): void {
    const ms = nanosToMillis(ns);
    if (ms <= 0) {
      return;
    }
    Atomics.wait(this.cell, 0, 0, ms);
  }
}
