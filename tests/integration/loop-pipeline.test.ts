/**
 * Integration test: Timeline → HeadlessWindow → EventLoop → Events
 *
 * Proves the full tickloop pipeline works end-to-end:
 * 1. Scenarios from @tickloop/headless script input and resizes
 * 2. HeadlessWindow replays them against a TestClock
 * 3. EventLoop from @tickloop/core schedules renders, updates and input
 * 4. A custom EventMap turns every decision into a log line
 *
 * No real time involved — the loop's sleeps advance the TestClock.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EventLoop, TestClock, createEventLoop } from "@tickloop/core";
import type { EventMap, LoopEvent } from "@tickloop/core";
import { HeadlessWindow, inputBurst, minimized } from "@tickloop/headless";
import type { KeyInput, Scenario } from "@tickloop/headless";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function windowFor<I>(scenario: Scenario<I>, clock: TestClock): HeadlessWindow<I> {
  return new HeadlessWindow({
    clock,
    width: scenario.width,
    height: scenario.height,
    steps: scenario.steps,
    durationMs: scenario.durationMs,
  });
}

/** Log lines stamped with the clock reading in milliseconds. */
function logMap(clock: TestClock): EventMap<KeyInput, string> {
  const at = (): string => `${clock.now() / 1_000_000}ms`;
  return {
    render: ({ width, height }) => `${at()} render ${width}x${height}`,
    afterRender: () => `${at()} afterRender`,
    update: () => `${at()} update`,
    input: ({ key }) => `${at()} input ${key}`,
    idle: ({ dt }) => `${at()} idle ${Math.round(dt * 1000)}ms`,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Loop pipeline: scenario → window → loop", () => {
  let clock: TestClock;

  beforeEach(() => {
    clock = new TestClock();
  });

  it("drains a burst of keys before the update that follows it", () => {
    const loop = new EventLoop(windowFor(inputBurst, clock), logMap(clock), {
      clock,
      sleeper: clock,
      ups: 50,
      maxFps: 25,
    });

    const lines = [...loop];
    const firstInput = lines.findIndex((line) => line.includes("input"));

    expect(lines.slice(firstInput - 1, firstInput + 4)).toEqual([
      "480ms idle 20ms",
      "500ms input boost",
      "500ms input reverse",
      "500ms input boost",
      "500ms update",
    ]);
  });

  it("keeps updating at a fixed rate while the surface is hidden", () => {
    const loop = createEventLoop(windowFor(minimized, clock), {
      clock,
      sleeper: clock,
      ups: 50,
      maxFps: 25,
    });

    const hidden: LoopEvent<KeyInput>[] = [];
    for (const event of loop) {
      const ms = clock.now() / 1_000_000;
      if (ms > 1000 && ms < 2000) {
        hidden.push(event);
      }
    }

    expect(hidden.some((event) => event.kind === "render")).toBe(false);
    expect(hidden.filter((event) => event.kind === "update")).toHaveLength(49);
  });

  it("stops exactly at the scenario's end", () => {
    const loop = createEventLoop(windowFor(inputBurst, clock), {
      clock,
      sleeper: clock,
      ups: 50,
      maxFps: 25,
    });

    let last: LoopEvent<KeyInput> | undefined;
    for (const event of loop) {
      last = event;
    }

    expect(loop.isClosed).toBe(true);
    expect(clock.now()).toBe(3_000_000_000);
    expect(last).toEqual({ kind: "idle", args: { dt: 0.02 } });
  });

  it("plays scenarios with any input type", () => {
    const counter: Scenario<number> = {
      name: "counter",
      description: "A single numeric input",
      width: 10,
      height: 10,
      durationMs: 100,
      steps: [{ delayMs: 30, kind: "input", input: 7 }],
    };
    const loop = createEventLoop(windowFor(counter, clock), {
      clock,
      sleeper: clock,
      ups: 50,
      maxFps: 25,
    });

    const inputs: { atNs: number; input: number }[] = [];
    for (const event of loop) {
      if (event.kind === "input") {
        inputs.push({ atNs: clock.now(), input: event.input });
      }
    }

    // Picked up while draining input before the update due at 40ms.
    expect(inputs).toEqual([{ atNs: 40_000_000, input: 7 }]);
  });
});
