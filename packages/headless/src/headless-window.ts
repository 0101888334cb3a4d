/**
 * HeadlessWindow — a window without a surface, driven by a timeline.
 *
 * Input and resize steps become visible once the clock passes their
 * offset. Because the event loop blocks the thread while it waits,
 * nothing can be pushed into the window from callbacks; the timeline is
 * read lazily whenever the loop polls.
 */

import { NANOS_PER_MILLI } from "@tickloop/core";
import type { Clock, Size, Window } from "@tickloop/core";

/**
 * A single step of a window timeline.
 *
 * `delayMs` is the pause *before* this step, relative to the previous
 * step (not absolute time).
 */
export type TimelineStep<I> =
  | { readonly delayMs: number; readonly kind: "input"; readonly input: I }
  | { readonly delayMs: number; readonly kind: "resize"; readonly width: number; readonly height: number };

/** Options for creating a HeadlessWindow. */
export interface HeadlessWindowOptions<I> {
  /** Clock the timeline is measured against. Use the loop's clock. */
  readonly clock: Clock;
  /** Initial drawable width. */
  readonly width: number;
  /** Initial drawable height. */
  readonly height: number;
  /** Timeline of input and resize steps. */
  readonly steps?: readonly TimelineStep<I>[];
  /** Report "should close" once this many milliseconds have elapsed. */
  readonly durationMs?: number;
}

interface ScheduledStep<I> {
  readonly atNs: number;
  readonly step: TimelineStep<I>;
}

/**
 * A Window whose input and size follow a scripted timeline.
 *
 * @example
 * ```ts
 * const clock = new HrtimeClock();
 * const window = new HeadlessWindow({
 *   clock,
 *   width: 320,
 *   height: 240,
 *   durationMs: 2000,
 *   steps: [{ delayMs: 500, kind: "input", input: { key: "reverse" } }],
 * });
 * for (const event of createEventLoop(window, { clock })) {
 *   // ...
 * }
 * ```
 */
export class HeadlessWindow<I> implements Window<I> {
  private readonly clock: Clock;
  private readonly startNs: number;
  private readonly durationNs: number | undefined;
  private readonly timeline: readonly ScheduledStep<I>[];
  private readonly pending: I[] = [];
  private cursor = 0;
  private currentSize: Size;
  private closed = false;
  private presentedFrames = 0;

  /**
   * @throws {Error} When a step delay or the duration is negative or not
   *   finite.
   */
  constructor(options: HeadlessWindowOptions<I>) {
    if (options.durationMs !== undefined && !isValidSpan(options.durationMs)) {
      throw new Error(`HeadlessWindow duration must be a finite, non-negative number of ms (got ${options.durationMs})`);
    }
    this.clock = options.clock;
    this.startNs = options.clock.now();
    this.durationNs =
      options.durationMs === undefined ? undefined : options.durationMs * NANOS_PER_MILLI;
    this.currentSize = { width: options.width, height: options.height };

    let atMs = 0;
    this.timeline = (options.steps ?? []).map((step, index) => {
      if (!isValidSpan(step.delayMs)) {
        throw new Error(`Timeline step ${index} has an invalid delay (${step.delayMs}ms)`);
      }
      atMs += step.delayMs;
      return { atNs: atMs * NANOS_PER_MILLI, step };
    });
  }

  shouldClose(): boolean {
    if (!this.closed && this.durationNs !== undefined && this.elapsed() >= this.durationNs) {
      this.closed = true;
    }
    return this.closed;
  }

  size(): Size {
    this.applyDueSteps();
    return this.currentSize;
  }

  pollEvent(): I | undefined {
    this.applyDueSteps();
    return this.pending.shift();
  }

  swapBuffers(): void {
    this.presentedFrames++;
  }

  /** Close the window. The loop stops at its next render attempt. */
  close(): void {
    this.closed = true;
  }

  /** Number of frames presented so far. */
  get presented(): number {
    return this.presentedFrames;
  }

  /** Timeline steps not yet reached. */
  get remainingSteps(): number {
    return this.timeline.length - this.cursor;
  }

  private elapsed(): number {
    return this.clock.now() - this.startNs;
  }

  private applyDueSteps(): void {
    const elapsed = this.elapsed();
    let next = this.timeline[this.cursor];
    while (next !== undefined && next.atNs <= elapsed) {
      const { step } = next;
      if (step.kind === "input") {
        this.pending.push(step.input);
      } else {
        this.currentSize = { width: step.width, height: step.height };
      }
      this.cursor++;
      next = this.timeline[this.cursor];
    }
  }
}

function isValidSpan(ms: number): boolean {
  return Number.isFinite(ms) && ms >= 0;
}
