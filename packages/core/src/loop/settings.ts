/**
 * Loop settings — update rate, frame cap and buffer swapping, plus the
 * timing derived from them.
 */

import { z } from "zod";
import { NANOS_PER_SECOND } from "./clock.js";

/** Default number of fixed updates per second. */
export const DEFAULT_UPS = 120;

/** Default maximum number of frames per second. */
export const DEFAULT_MAX_FPS = 60;

/** A rate in events per second. Above one billion the period would floor to 0ns. */
const rateSchema = z
  .number()
  .int("must be a whole number of events per second")
  .positive("must be greater than zero")
  .max(NANOS_PER_SECOND, `must not exceed ${NANOS_PER_SECOND}`);

/** Schema for complete loop settings. Shared with CLI front ends. */
export const loopSettingsSchema = z.object({
  ups: rateSchema,
  maxFps: rateSchema,
  swapBuffers: z.boolean(),
});

/** Validated loop settings. */
export type LoopSettings = z.infer<typeof loopSettingsSchema>;

/** Name of a setting. */
export type LoopSettingName = keyof LoopSettings;

/** Periods derived from the settings. */
export interface LoopTiming {
  /** Nanoseconds between fixed updates. */
  readonly updatePeriodNs: number;
  /** Minimum nanoseconds between render attempts. */
  readonly framePeriodNs: number;
  /** Seconds simulated by one update. */
  readonly updateDt: number;
}

/** Thrown when a setting is rejected. */
export class LoopConfigError extends Error {
  readonly field: LoopSettingName;
  readonly value: unknown;

  constructor(field: LoopSettingName, value: unknown, reason: string) {
    super(`Invalid ${field} (${String(value)}): ${reason}`);
    this.name = "LoopConfigError";
    this.field = field;
    this.value = value;
  }
}

/** The settings a loop starts with. */
export const DEFAULT_SETTINGS: LoopSettings = {
  ups: DEFAULT_UPS,
  maxFps: DEFAULT_MAX_FPS,
  swapBuffers: true,
};

/**
 * Validate one setting.
 *
 * @throws {LoopConfigError} When the value does not satisfy the schema.
 */
export function validateSetting<K extends LoopSettingName>(
  field: K,
  value: LoopSettings[K],
): LoopSettings[K] {
  const result = loopSettingsSchema.shape[field].safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "invalid value";
    throw new LoopConfigError(field, value, reason);
  }
  return value;
}

/**
 * Validate a partial set of settings on top of the defaults.
 *
 * @throws {LoopConfigError} On the first rejected setting.
 */
export function resolveSettings(overrides: Partial<LoopSettings> = {}): LoopSettings {
  return {
    ups: validateSetting("ups", overrides.ups ?? DEFAULT_SETTINGS.ups),
    maxFps: validateSetting("maxFps", overrides.maxFps ?? DEFAULT_SETTINGS.maxFps),
    swapBuffers: validateSetting("swapBuffers", overrides.swapBuffers ?? DEFAULT_SETTINGS.swapBuffers),
  };
}

/** Derive periods from validated settings. Periods are whole nanoseconds. */
export function deriveTiming(settings: LoopSettings): LoopTiming {
  return {
    updatePeriodNs: Math.floor(NANOS_PER_SECOND / settings.ups),
    framePeriodNs: Math.floor(NANOS_PER_SECOND / settings.maxFps),
    updateDt: 1 / settings.ups,
  };
}
