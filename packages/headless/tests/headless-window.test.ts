import { describe, it, expect } from "vitest";
import { TestClock } from "@tickloop/core";
import { HeadlessWindow } from "../src/headless-window.js";
import type { KeyInput } from "../src/scenarios/types.js";

describe("HeadlessWindow", () => {
  it("delivers input once its offset has passed", () => {
    const clock = new TestClock();
    const window = new HeadlessWindow<KeyInput>({
      clock,
      width: 10,
      height: 10,
      steps: [
        { delayMs: 500, kind: "input", input: { key: "a" } },
        { delayMs: 0, kind: "input", input: { key: "b" } },
        { delayMs: 250, kind: "input", input: { key: "c" } },
      ],
    });

    expect(window.pollEvent()).toBeUndefined();

    clock.advanceMillis(500);
    expect(window.pollEvent()).toEqual({ key: "a" });
    expect(window.pollEvent()).toEqual({ key: "b" });
    expect(window.pollEvent()).toBeUndefined();
    expect(window.remainingSteps).toBe(1);

    clock.advanceMillis(250);
    expect(window.pollEvent()).toEqual({ key: "c" });
    expect(window.remainingSteps).toBe(0);
  });

  it("applies resize steps when the size is read", () => {
    const clock = new TestClock();
    const window = new HeadlessWindow<KeyInput>({
      clock,
      width: 10,
      height: 10,
      steps: [{ delayMs: 100, kind: "resize", width: 0, height: 0 }],
    });

    expect(window.size()).toEqual({ width: 10, height: 10 });
    clock.advanceMillis(100);
    expect(window.size()).toEqual({ width: 0, height: 0 });
  });

  it("closes when the duration elapses", () => {
    const clock = new TestClock();
    const window = new HeadlessWindow<KeyInput>({ clock, width: 10, height: 10, durationMs: 1000 });

    expect(window.shouldClose()).toBe(false);
    clock.advanceMillis(999);
    expect(window.shouldClose()).toBe(false);
    clock.advanceMillis(1);
    expect(window.shouldClose()).toBe(true);
  });

  it("measures the timeline from its creation", () => {
    const clock = new TestClock(5_000_000_000);
    const window = new HeadlessWindow<KeyInput>({
      clock,
      width: 10,
      height: 10,
      durationMs: 10,
      steps: [{ delayMs: 5, kind: "input", input: { key: "late" } }],
    });

    expect(window.pollEvent()).toBeUndefined();
    clock.advanceMillis(10);
    expect(window.pollEvent()).toEqual({ key: "late" });
    expect(window.shouldClose()).toBe(true);
  });

  it("stays open without a duration until closed", () => {
    const clock = new TestClock();
    const window = new HeadlessWindow<KeyInput>({ clock, width: 10, height: 10 });

    clock.advanceMillis(60_000);
    expect(window.shouldClose()).toBe(false);
    window.close();
    expect(window.shouldClose()).toBe(true);
  });

  it("counts presented frames", () => {
    const window = new HeadlessWindow<KeyInput>({ clock: new TestClock(), width: 10, height: 10 });
    window.swapBuffers();
    window.swapBuffers();
    expect(window.presented).toBe(2);
  });

  it("rejects steps that would move backwards in time", () => {
    const clock = new TestClock();
    const steps = [
      { delayMs: 100, kind: "input" as const, input: { key: "a" } },
      { delayMs: -50, kind: "input" as const, input: { key: "b" } },
    ];

    expect(() => new HeadlessWindow<KeyInput>({ clock, width: 10, height: 10, steps })).toThrow(
      "Timeline step 1 has an invalid delay (-50ms)",
    );
  });

  it("rejects non-finite delays and durations", () => {
    const clock = new TestClock();

    expect(
      () =>
        new HeadlessWindow<KeyInput>({
          clock,
          width: 10,
          height: 10,
          steps: [{ delayMs: Number.NaN, kind: "resize", width: 1, height: 1 }],
        }),
    ).toThrow("Timeline step 0 has an invalid delay (NaNms)");
    expect(
      () => new HeadlessWindow<KeyInput>({ clock, width: 10, height: 10, durationMs: Number.POSITIVE_INFINITY }),
    ).toThrow("HeadlessWindow duration must be a finite, non-negative number of ms (got Infinity)");
  });
});
