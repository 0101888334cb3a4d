#!/usr/bin/env node
/**
 * tickloop-demo — runs a headless scenario through the event loop and
 * reports what the loop did once per simulated second.
 *
 * Usage:
 *   npm run demo
 *   npm run demo -- --scenario input-burst --ups 60 --fps 30
 *   npm run demo -- --scenario minimized --no-swap
 */

import { parseConfig } from "./config.js";
import { formatStats } from "./loop-stats.js";
import { runDemo } from "./run-demo.js";

/** Entry point for the tickloop-demo CLI. */
function main(): void {
  const config = parseConfig(process.argv, process.env);
  const { scenario } = config;

  console.log(`[tickloop] scenario: ${scenario.name} (${scenario.description})`);
  console.log(`[tickloop] ups:      ${config.ups}`);
  console.log(`[tickloop] max fps:  ${config.maxFps}`);
  console.log(`[tickloop] swap:     ${config.swapBuffers}`);

  let second = 0;
  const result = runDemo({
    scenario,
    ups: config.ups,
    maxFps: config.maxFps,
    swapBuffers: config.swapBuffers,
    onReport: (stats) => {
      second++;
      console.log(`[tickloop] t=${second}s ${formatStats(stats)}`);
    },
  });

  console.log(`[tickloop] done: ${formatStats(result.stats)} presented=${result.presented}`);
}

try {
  main();
} catch (err) {
  console.error("[tickloop] Fatal:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
