import { describe, it, expect } from "vitest";
import { parseConfig } from "../src/config.js";
import { minimized, steady } from "../src/scenarios/index.js";

describe("parseConfig", () => {
  it("uses defaults without arguments", () => {
    expect(parseConfig(["node", "cli.js"])).toEqual({
      scenario: steady,
      ups: 120,
      maxFps: 60,
      swapBuffers: true,
    });
  });

  it("parses every flag", () => {
    const config = parseConfig([
      "node",
      "cli.js",
      "--scenario",
      "minimized",
      "--ups",
      "60",
      "--fps",
      "30",
      "--no-swap",
    ]);
    expect(config).toEqual({ scenario: minimized, ups: 60, maxFps: 30, swapBuffers: false });
  });

  it("reads the default scenario from the environment", () => {
    const env = { TICKLOOP_SCENARIO: "input-burst" };
    expect(parseConfig(["node", "cli.js"], env).scenario.name).toBe("input-burst");
    expect(parseConfig(["node", "cli.js", "--scenario", "steady"], env).scenario).toBe(steady);
  });

  it("rejects unknown scenarios", () => {
    expect(() => parseConfig(["node", "cli.js", "--scenario", "nope"])).toThrow(
      "Invalid --scenario: must be one of: steady, input-burst, minimized",
    );
  });

  it("rejects an unknown scenario from the environment", () => {
    expect(() => parseConfig(["node", "cli.js"], { TICKLOOP_SCENARIO: "bogus" })).toThrow(
      "Invalid --scenario: must be one of: steady, input-burst, minimized",
    );
  });

  it("rejects a zero update rate", () => {
    expect(() => parseConfig(["node", "cli.js", "--ups", "0"])).toThrow(
      "Invalid --ups: must be greater than zero",
    );
  });

  it("rejects a frame rate that is not a number", () => {
    expect(() => parseConfig(["node", "cli.js", "--fps", "fast"])).toThrow("Invalid --fps:");
  });
});
