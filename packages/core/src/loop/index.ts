/**
 * @tickloop/core loop module — public API exports.
 */

// Engine
export { EventLoop, createEventLoop } from "./event-loop.js";
export type { EventLoopOptions } from "./event-loop.js";

// Settings
export {
  DEFAULT_UPS,
  DEFAULT_MAX_FPS,
  DEFAULT_SETTINGS,
  LoopConfigError,
  loopSettingsSchema,
  validateSetting,
  resolveSettings,
  deriveTiming,
} from "./settings.js";
export type { LoopSettings, LoopSettingName, LoopTiming } from "./settings.js";

// Events
export { loopEventMap, dispatchLoopEvent } from "./events.js";
export type {
  RenderArgs,
  AfterRenderArgs,
  UpdateArgs,
  IdleArgs,
  EventMap,
  LoopEvent,
  LoopEventKind,
  LoopEventHandlers,
} from "./events.js";

// Clock, sleeper & window
export { NANOS_PER_SECOND, NANOS_PER_MILLI, nanosToMillis, nanosToSeconds } from "./clock.js";
export type { Clock, Sleeper } from "./clock.js";
export { HrtimeClock, AtomicsSleeper } from "./node-clock.js";
export type { Size, Window } from "./window.js";

// Test utilities
export { TestClock } from "./test-clock.js";
export { TestWindow } from "./test-window.js";
export type { TestWindowOptions } from "./test-window.js";
