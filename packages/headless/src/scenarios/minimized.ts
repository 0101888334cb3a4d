/**
 * Scenario: minimized window.
 *
 * The surface collapses to 0x0 for one second. Frames are skipped while
 * updates keep their fixed rate.
 *
 * Total duration: 3s.
 */

import type { Scenario, ScenarioStep } from "./types.js";

const steps: readonly ScenarioStep[] = [
  { delayMs: 1000, kind: "resize", width: 0, height: 0 },
  { delayMs: 1000, kind: "resize", width: 320, height: 240 },
];

export const minimized: Scenario = {
  name: "minimized",
  description: "Surface hidden between 1s and 2s",
  width: 320,
  height: 240,
  durationMs: 3000,
  steps,
};
