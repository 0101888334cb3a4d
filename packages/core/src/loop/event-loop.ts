/**
 * EventLoop — the scheduler that drives an application's main loop.
 *
 * On each pull it decides whether to render a frame, deliver input,
 * commit a fixed-step update, or report idle time. Two independent
 * periodic schedules (frames and updates) are compared against the clock;
 * the loop passes through as many internal phases as needed until it has
 * something to hand back, sleeping at most once per waiting interval.
 */

import { nanosToSeconds } from "./clock.js";
import type { Clock, Sleeper } from "./clock.js";
import { loopEventMap } from "./events.js";
import type { EventMap, LoopEvent } from "./events.js";
import { AtomicsSleeper, HrtimeClock } from "./node-clock.js";
import { deriveTiming, resolveSettings, validateSetting } from "./settings.js";
import type { LoopSettings, LoopTiming } from "./settings.js";
import type { Window } from "./window.js";

/** Options for creating an EventLoop. */
export interface EventLoopOptions extends Partial<LoopSettings> {
  /** Time source. Defaults to an `HrtimeClock`. */
  readonly clock?: Clock;
  /** Sleep primitive. Defaults to an `AtomicsSleeper`. */
  readonly sleeper?: Sleeper;
}

/** Internal scheduler phase. */
type LoopState =
  | { readonly phase: "render" }
  | { readonly phase: "swapBuffers" }
  | { readonly phase: "updateLoop"; readonly idleReported: boolean }
  | { readonly phase: "handleEvents" }
  | { readonly phase: "update" };

const RENDER: LoopState = { phase: "render" };
const SWAP_BUFFERS: LoopState = { phase: "swapBuffers" };
const WAITING: LoopState = { phase: "updateLoop", idleReported: false };
const IDLE_REPORTED: LoopState = { phase: "updateLoop", idleReported: true };
const HANDLE_EVENTS: LoopState = { phase: "handleEvents" };
const UPDATE: LoopState = { phase: "update" };

/**
 * A pull-based event loop over a window.
 *
 * Call `nextEvent()` (or iterate) until it yields nothing, which happens
 * once the window reports it should close. Calls block while the loop
 * sleeps; run it on the thread that owns the window's event source. On
 * Node.js the sleep holds the whole event loop, so timers and I/O
 * callbacks do not run until the next event is returned.
 *
 * Updates are committed on a fixed grid: `lastUpdateNs` only ever moves
 * by whole update periods, so simulated time never drifts from wall time
 * even when frames are slow. Frames are scheduled from the previous
 * frame, so the frame rate can slip below `maxFps`.
 *
 * @typeParam I - Input item type of the window.
 * @typeParam E - Event type produced by the event map.
 *
 * @example
 * ```ts
 * const loop = new EventLoop(window, loopEventMap<KeyPress>())
 *   .ups(120)
 *   .maxFps(60);
 *
 * for (const event of loop) {
 *   if (event.kind === "render") {
 *     draw(event.args.extDt, event.args.width, event.args.height);
 *   }
 * }
 * ```
 */
export class EventLoop<I, E> implements IterableIterator<E> {
  private readonly window: Window<I>;
  private readonly eventMap: EventMap<I, E>;
  private readonly clock: Clock;
  private readonly sleeper: Sleeper;
  private currentSettings: LoopSettings;
  private currentTiming: LoopTiming;
  private state: LoopState = RENDER;
  private lastUpdate: number;
  private lastFrame: number;
  private closed = false;

  /**
   * @throws {LoopConfigError} When a rate in `options` is rejected.
   */
  constructor(window: Window<I>, eventMap: EventMap<I, E>, options: EventLoopOptions = {}) {
    this.window = window;
    this.eventMap = eventMap;
    this.clock = options.clock ?? new HrtimeClock();
    this.sleeper = options.sleeper ?? new AtomicsSleeper();
    this.currentSettings = resolveSettings(options);
    this.currentTiming = deriveTiming(this.currentSettings);

    const start = this.clock.now();
    this.lastUpdate = start;
    this.lastFrame = start;
  }

  /**
   * Set the number of fixed updates per second.
   *
   * This is the update rate on average over time; when the loop lags it
   * catches up with back-to-back updates. Takes effect from the next
   * scheduling decision, measured from the last committed update.
   *
   * @throws {LoopConfigError} When `rate` is not a positive integer.
   */
  ups(rate: number): this {
    this.currentSettings = { ...this.currentSettings, ups: validateSetting("ups", rate) };
    this.currentTiming = deriveTiming(this.currentSettings);
    return this;
  }

  /**
   * Set the maximum number of frames per second.
   *
   * Takes effect from the next scheduling decision, measured from the
   * last render attempt.
   *
   * @throws {LoopConfigError} When `rate` is not a positive integer.
   */
  maxFps(rate: number): this {
    this.currentSettings = { ...this.currentSettings, maxFps: validateSetting("maxFps", rate) };
    this.currentTiming = deriveTiming(this.currentSettings);
    return this;
  }

  /** Enable or disable presenting frames (and the `afterRender` event). */
  swapBuffers(enabled: boolean): this {
    this.currentSettings = { ...this.currentSettings, swapBuffers: validateSetting("swapBuffers", enabled) };
    return this;
  }

  /** Current settings. */
  get settings(): LoopSettings {
    return this.currentSettings;
  }

  /** Periods derived from the current settings. */
  get timing(): LoopTiming {
    return this.currentTiming;
  }

  /** Clock reading of the last committed update, in nanoseconds. */
  get lastUpdateNs(): number {
    return this.lastUpdate;
  }

  /** Clock reading of the last render attempt, in nanoseconds. */
  get lastFrameNs(): number {
    return this.lastFrame;
  }

  /** Whether the loop has finished because the window closed. */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Produce the next event, or `undefined` once the window reports it
   * should close. After that, every call returns `undefined` without
   * touching the window.
   */
  nextEvent(): E | undefined {
    if (this.closed) {
      return undefined;
    }

    for (;;) {
      const state = this.state;
      switch (state.phase) {
        case "render": {
          if (this.window.shouldClose()) {
            this.closed = true;
            return undefined;
          }

          const startRender = this.clock.now();
          this.lastFrame = startRender;

          const { width, height } = this.window.size();
          if (width !== 0 && height !== 0) {
            this.state = SWAP_BUFFERS;
            return this.eventMap.render({
              extDt: nanosToSeconds(startRender - this.lastUpdate),
              width,
              height,
            });
          }

          // Surface not ready: skip the frame.
          this.state = WAITING;
          break;
        }

        case "swapBuffers": {
          this.state = WAITING;
          if (this.currentSettings.swapBuffers) {
            this.window.swapBuffers();
            return this.eventMap.afterRender({});
          }
          break;
        }

        case "updateLoop": {
          const now = this.clock.now();
          const nextFrame = this.lastFrame + this.currentTiming.framePeriodNs;
          const nextUpdate = this.lastUpdate + this.currentTiming.updatePeriodNs;
          const nextDue = Math.min(nextFrame, nextUpdate);

          if (nextDue > now) {
            const input = this.window.pollEvent();
            if (input !== undefined) {
              this.state = WAITING;
              return this.eventMap.input(input);
            }
            if (!state.idleReported) {
              this.state = IDLE_REPORTED;
              return this.eventMap.idle({ dt: nanosToSeconds(nextDue - now) });
            }
            this.sleeper.sleep(nextDue - now);
            this.state = WAITING;
          } else if (nextDue === nextFrame) {
            this.state = RENDER;
          } else {
            this.state = HANDLE_EVENTS;
          }
          break;
        }

        case "handleEvents": {
          // Drain all input before the update.
          const input = this.window.pollEvent();
          if (input !== undefined) {
            return this.eventMap.input(input);
          }
          this.state = UPDATE;
          break;
        }

        case "update": {
          this.state = WAITING;
          this.lastUpdate += this.currentTiming.updatePeriodNs;
          return this.eventMap.update({ dt: this.currentTiming.updateDt });
        }
      }
    }
  }

  /** Iterator protocol over `nextEvent()`. */
  next(): IteratorResult<E, undefined> {
    const event = this.nextEvent();
    if (event === undefined) {
      return { done: true, value: undefined };
    }
    return { done: false, value: event };
  }

  [Symbol.iterator](): this {
    return this;
  }
}

/**
 * Create an EventLoop yielding the built-in `LoopEvent` union.
 *
 * @throws {LoopConfigError} When a rate in `options` is rejected.
 */
export function createEventLoop<I>(
  window: Window<I>,
  options: EventLoopOptions = {},
): EventLoop<I, LoopEvent<I>> {
  return new EventLoop(window, loopEventMap<I>(), options);
}
