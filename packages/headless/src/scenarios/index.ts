/**
 * Predefined headless scenarios for demos and tests.
 */

export type { KeyInput, Scenario, ScenarioStep } from "./types.js";
export { steady } from "./steady.js";
export { inputBurst } from "./input-burst.js";
export { minimized } from "./minimized.js";

import type { Scenario } from "./types.js";
import { steady } from "./steady.js";
import { inputBurst } from "./input-burst.js";
import { minimized } from "./minimized.js";

/** All available scenarios, indexed by name. */
export const SCENARIOS: ReadonlyMap<string, Scenario> = new Map([
  [steady.name, steady],
  [inputBurst.name, inputBurst],
  [minimized.name, minimized],
]);
