/**
 * Scenario: steady state.
 *
 * No input, a fixed surface. Shows the plain render/update/idle rhythm.
 *
 * Total duration: 2s.
 */

import type { Scenario } from "./types.js";

export const steady: Scenario = {
  name: "steady",
  description: "Two seconds with no input and a fixed 320x240 surface",
  width: 320,
  height: 240,
  durationMs: 2000,
  steps: [],
};
