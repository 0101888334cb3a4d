/**
 * @tickloop/core — Fixed-timestep event loop for games and interactive applications.
 *
 * Pull-based and synchronous. Depends only on zod for settings validation.
 * The window, clock and sleep primitive are capabilities supplied by the caller.
 */

export {
  EventLoop,
  createEventLoop,
  DEFAULT_UPS,
  DEFAULT_MAX_FPS,
  DEFAULT_SETTINGS,
  LoopConfigError,
  loopSettingsSchema,
  validateSetting,
  resolveSettings,
  deriveTiming,
  loopEventMap,
  dispatchLoopEvent,
  NANOS_PER_SECOND,
  NANOS_PER_MILLI,
  nanosToMillis,
  nanosToSeconds,
  HrtimeClock,
  AtomicsSleeper,
  TestClock,
  TestWindow,
} from "./loop/index.js";

export type {
  EventLoopOptions,
  LoopSettings,
  LoopSettingName,
  LoopTiming,
  RenderArgs,
  AfterRenderArgs,
  UpdateArgs,
  IdleArgs,
  EventMap,
  LoopEvent,
  LoopEventKind,
  LoopEventHandlers,
  Clock,
  Sleeper,
  Size,
  Window,
  TestWindowOptions,
} from "./loop/index.js";
