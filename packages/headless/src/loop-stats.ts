/**
 * LoopStats — running totals over the events a loop produced.
 */

import type { LoopEvent } from "@tickloop/core";

/** Immutable view of the totals. */
export interface LoopStatsSnapshot {
  readonly renders: number;
  readonly afterRenders: number;
  readonly updates: number;
  readonly inputs: number;
  readonly idles: number;
  /** Sum of the `dt` of every idle event, in seconds. */
  readonly idleSeconds: number;
  /** Sum of the `dt` of every update event, in seconds. */
  readonly simulatedSeconds: number;
}

/** Counts events by kind. */
export class LoopStats {
  private totals: LoopStatsSnapshot = {
    renders: 0,
    afterRenders: 0,
    updates: 0,
    inputs: 0,
    idles: 0,
    idleSeconds: 0,
    simulatedSeconds: 0,
  };

  /** Add one event to the totals. */
  record(event: LoopEvent<unknown>): void {
    const t = this.totals;
    switch (event.kind) {
      case "render":
        this.totals = { ...t, renders: t.renders + 1 };
        break;
      case "afterRender":
        this.totals = { ...t, afterRenders: t.afterRenders + 1 };
        break;
      case "update":
        this.totals = {
          ...t,
          updates: t.updates + 1,
          simulatedSeconds: t.simulatedSeconds + event.args.dt,
        };
        break;
      case "input":
        this.totals = { ...t, inputs: t.inputs + 1 };
        break;
      case "idle":
        this.totals = { ...t, idles: t.idles + 1, idleSeconds: t.idleSeconds + event.args.dt };
        break;
    }
  }

  /** Current totals. */
  snapshot(): LoopStatsSnapshot {
    return this.totals;
  }
}

/**
 * One-line summary of a snapshot.
 *
 * @example
 * ```ts
 * formatStats(stats.snapshot());
 * // "renders=60 updates=120 inputs=0 idles=180 idle=0.912s simulated=1.000s"
 * ```
 */
export function formatStats(stats: LoopStatsSnapshot): string {
  return [
    `renders=${stats.renders}`,
    `updates=${stats.updates}`,
    `inputs=${stats.inputs}`,
    `idles=${stats.idles}`,
    `idle=${stats.idleSeconds.toFixed(3)}s`,
    `simulated=${stats.simulatedSeconds.toFixed(3)}s`,
  ].join(" ");
}
