import { describe, it, expect, vi } from "vitest";
import { dispatchLoopEvent, loopEventMap } from "../src/loop/index.js";
import type { LoopEvent } from "../src/loop/index.js";

describe("loopEventMap", () => {
  const map = loopEventMap<number>();

  it("tags each event by kind", () => {
    expect(map.render({ extDt: 0.25, width: 320, height: 200 })).toEqual({
      kind: "render",
      args: { extDt: 0.25, width: 320, height: 200 },
    });
    expect(map.afterRender({})).toEqual({ kind: "afterRender", args: {} });
    expect(map.update({ dt: 0.01 })).toEqual({ kind: "update", args: { dt: 0.01 } });
    expect(map.input(7)).toEqual({ kind: "input", input: 7 });
    expect(map.idle({ dt: 0.003 })).toEqual({ kind: "idle", args: { dt: 0.003 } });
  });
});

describe("dispatchLoopEvent", () => {
  it("calls the handler matching the event kind", () => {
    const onRender = vi.fn();
    const onUpdate = vi.fn();
    const onInput = vi.fn();

    const events: LoopEvent<string>[] = [
      { kind: "render", args: { extDt: 0, width: 10, height: 20 } },
      { kind: "update", args: { dt: 0.5 } },
      { kind: "input", input: "space" },
    ];
    for (const event of events) {
      dispatchLoopEvent(event, { onRender, onUpdate, onInput });
    }

    expect(onRender).toHaveBeenCalledWith({ extDt: 0, width: 10, height: 20 });
    expect(onUpdate).toHaveBeenCalledWith({ dt: 0.5 });
    expect(onInput).toHaveBeenCalledWith("space");
  });

  it("ignores kinds without a handler", () => {
    const onRender = vi.fn();

    dispatchLoopEvent<string>({ kind: "idle", args: { dt: 1 } }, { onRender });
    dispatchLoopEvent<string>({ kind: "afterRender", args: {} }, { onRender });

    expect(onRender).not.toHaveBeenCalled();
  });

  it("routes idle and afterRender", () => {
    const onIdle = vi.fn();
    const onAfterRender = vi.fn();

    dispatchLoopEvent<string>({ kind: "idle", args: { dt: 0.2 } }, { onIdle, onAfterRender });
    dispatchLoopEvent<string>({ kind: "afterRender", args: {} }, { onIdle, onAfterRender });

    expect(onIdle).toHaveBeenCalledTimes(1);
    expect(onIdle).toHaveBeenCalledWith({ dt: 0.2 });
    expect(onAfterRender).toHaveBeenCalledTimes(1);
  });
});
