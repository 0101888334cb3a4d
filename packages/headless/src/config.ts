/**
 * CLI argument parsing for tickloop-demo.
 *
 * Supports:
 *   tickloop-demo
 *   tickloop-demo --scenario input-burst
 *   tickloop-demo --ups 60 --fps 30 --no-swap
 */

import { DEFAULT_SETTINGS, loopSettingsSchema } from "@tickloop/core";
import { z } from "zod";
import { SCENARIOS } from "./scenarios/index.js";
import type { Scenario } from "./scenarios/types.js";

/** Scenario used when neither --scenario nor TICKLOOP_SCENARIO is given. */
const DEFAULT_SCENARIO = "steady";

/** Flag each config field is read from, for error messages. */
const FLAGS: Readonly<Record<string, string>> = {
  scenario: "--scenario",
  ups: "--ups",
  maxFps: "--fps",
  swapBuffers: "--no-swap",
};

const demoConfigSchema = loopSettingsSchema.extend({
  scenario: z.string().transform((name, ctx): Scenario => {
    const scenario = SCENARIOS.get(name);
    if (scenario === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be one of: ${[...SCENARIOS.keys()].join(", ")}`,
      });
      return z.NEVER;
    }
    return scenario;
  }),
});

/** Parsed configuration for a demo session, with the scenario resolved. */
export type DemoConfig = z.infer<typeof demoConfigSchema>;

/**
 * Parses process.argv into a DemoConfig.
 *
 * @param argv - The full process.argv array
 * @param env - Environment; `TICKLOOP_SCENARIO` sets the default scenario
 * @throws {Error} When a value is rejected; the message names the flag.
 */
export function parseConfig(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): DemoConfig {
  const args = argv.slice(2); // skip node + script

  const raw = {
    scenario: env["TICKLOOP_SCENARIO"] ?? DEFAULT_SCENARIO,
    ups: DEFAULT_SETTINGS.ups,
    maxFps: DEFAULT_SETTINGS.maxFps,
    swapBuffers: DEFAULT_SETTINGS.swapBuffers,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--scenario" && next !== undefined) {
      raw.scenario = next;
      i++;
    } else if (arg === "--ups" && next !== undefined) {
      raw.ups = Number(next);
      i++;
    } else if (arg === "--fps" && next !== undefined) {
      raw.maxFps = Number(next);
      i++;
    } else if (arg === "--no-swap") {
      raw.swapBuffers = false;
    }
  }

  const result = demoConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = String(issue?.path[0] ?? "config");
    throw new Error(`Invalid ${FLAGS[field] ?? field}: ${issue?.message ?? "invalid value"}`);
  }
  return result.data;
}
