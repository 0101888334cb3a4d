/**
 * Scenario: input burst.
 *
 * Three keys arrive together half a second in, then one more a second
 * later. The burst is drained before the next update is committed.
 *
 * Total duration: 3s.
 */

import type { Scenario, ScenarioStep } from "./types.js";

const steps: readonly ScenarioStep[] = [
  { delayMs: 500, kind: "input", input: { key: "boost" } },
  { delayMs: 0, kind: "input", input: { key: "reverse" } },
  { delayMs: 0, kind: "input", input: { key: "boost" } },
  { delayMs: 1000, kind: "input", input: { key: "reverse" } },
];

export const inputBurst: Scenario = {
  name: "input-burst",
  description: "A burst of three keys at 0.5s and a single key at 1.5s",
  width: 320,
  height: 240,
  durationMs: 3000,
  steps,
};
