/**
 * Types for defining headless demo scenarios.
 *
 * A scenario is a fixed-length session: a surface size and a timeline
 * of key presses and resizes played against the loop's clock.
 */

import type { TimelineStep } from "../headless-window.js";

/** A key press delivered to the demo. */
export interface KeyInput {
  /** Key name, e.g. "reverse" or "boost". */
  readonly key: string;
}

/** A single step in a scenario timeline. */
export type ScenarioStep<I = KeyInput> = TimelineStep<I>;

/**
 * A named scenario.
 *
 * @typeParam I - Input item type carried by the timeline. The bundled
 *   scenarios all use `KeyInput`.
 */
export interface Scenario<I = KeyInput> {
  /** Human-readable name for this scenario. */
  readonly name: string;
  /** Description of what this scenario demonstrates. */
  readonly description: string;
  /** Initial surface width. */
  readonly width: number;
  /** Initial surface height. */
  readonly height: number;
  /** Session length in milliseconds. */
  readonly durationMs: number;
  /** Ordered timeline of steps. */
  readonly steps: readonly ScenarioStep<I>[];
}
