/**
 * @tickloop/headless — Headless window, demo scenarios and demo runner
 * for the tickloop event loop.
 */

export { HeadlessWindow } from "./headless-window.js";
export type { HeadlessWindowOptions, TimelineStep } from "./headless-window.js";
export { BouncingBall } from "./bouncing-ball.js";
export type { BouncingBallOptions } from "./bouncing-ball.js";
export { LoopStats, formatStats } from "./loop-stats.js";
export type { LoopStatsSnapshot } from "./loop-stats.js";
export { runDemo } from "./run-demo.js";
export type { DemoOptions, DemoResult } from "./run-demo.js";
export { parseConfig } from "./config.js";
export type { DemoConfig } from "./config.js";
export { steady, inputBurst, minimized, SCENARIOS } from "./scenarios/index.js";
export type { KeyInput, Scenario, ScenarioStep } from "./scenarios/index.js";
