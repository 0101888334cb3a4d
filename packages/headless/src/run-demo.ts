/**
 * Demo runner — plays a scenario through an event loop and a bouncing ball.
 *
 * Decoupled from the console: progress goes to an optional callback.
 */

import { HrtimeClock, createEventLoop, dispatchLoopEvent } from "@tickloop/core";
import type { Clock, LoopSettings, Sleeper } from "@tickloop/core";
import { BouncingBall } from "./bouncing-ball.js";
import { HeadlessWindow } from "./headless-window.js";
import { LoopStats } from "./loop-stats.js";
import type { LoopStatsSnapshot } from "./loop-stats.js";
import type { Scenario } from "./scenarios/types.js";

/** Options for running a demo. */
export interface DemoOptions extends Partial<LoopSettings> {
  /** The scenario to play. */
  readonly scenario: Scenario;
  /** Time source shared by the loop and the window. Defaults to an `HrtimeClock`. */
  readonly clock?: Clock;
  /** Sleep primitive for the loop. Defaults to the loop's own. */
  readonly sleeper?: Sleeper;
  /** Called after every `ups` updates, i.e. once per simulated second. */
  readonly onReport?: (stats: LoopStatsSnapshot) => void;
}

/** What a finished demo produced. */
export interface DemoResult {
  /** Totals over the whole session. */
  readonly stats: LoopStatsSnapshot;
  /** Frames the window presented. */
  readonly presented: number;
  /** Committed ball position at the end. */
  readonly ballX: number;
  /** Last position drawn, or undefined when nothing was rendered. */
  readonly lastDrawnX: number | undefined;
}

/**
 * Runs a scenario to completion. Blocks until the scenario's duration
 * has elapsed on the given clock.
 *
 * @throws {LoopConfigError} When a rate is rejected.
 */
export function runDemo(options: DemoOptions): DemoResult {
  const { scenario } = options;
  const clock = options.clock ?? new HrtimeClock();
  const window = new HeadlessWindow({
    clock,
    width: scenario.width,
    height: scenario.height,
    steps: scenario.steps,
    durationMs: scenario.durationMs,
  });
  const loop = createEventLoop(window, {
    clock,
    sleeper: options.sleeper,
    ups: options.ups,
    maxFps: options.maxFps,
    swapBuffers: options.swapBuffers,
  });
  const ball = new BouncingBall({ width: scenario.width });
  const stats = new LoopStats();
  const ups = loop.settings.ups;
  let lastDrawnX: number | undefined;

  for (const event of loop) {
    stats.record(event);
    dispatchLoopEvent(event, {
      onRender: ({ extDt }) => {
        lastDrawnX = ball.renderX(extDt);
      },
      onUpdate: ({ dt }) => {
        ball.update(dt);
        if (stats.snapshot().updates % ups === 0) {
          options.onReport?.(stats.snapshot());
        }
      },
      onInput: (input) => {
        ball.handleInput(input);
      },
    });
  }

  return {
    stats: stats.snapshot(),
    presented: window.presented,
    ballX: ball.x,
    lastDrawnX,
  };
}
