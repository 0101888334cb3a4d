/**
 * TestWindow — in-memory window for event loop tests.
 *
 * Input is queued by the test, the size can change at any time, and
 * every buffer swap is counted.
 */

import type { Size, Window } from "./window.js";

/** Options for creating a TestWindow. */
export interface TestWindowOptions {
  /** Initial drawable width. Defaults to 100. */
  readonly width?: number;
  /** Initial drawable height. Defaults to 100. */
  readonly height?: number;
  /**
   * Report "should close" once `shouldClose()` has returned false this
   * many times. Unset means the window stays open until `close()`.
   */
  readonly closeAfterChecks?: number;
}

/**
 * A Window whose state is set directly by the test.
 *
 * @example
 * ```ts
 * const window = new TestWindow<string>({ closeAfterChecks: 3 });
 * window.queue.push("jump");
 *
 * const events = [...createEventLoop(window, { clock, sleeper: clock, ups: 50, maxFps: 25 })];
 * expect(window.presented).toBe(3);
 * ```
 */
export class TestWindow<I> implements Window<I> {
  /** Pending input, delivered front first. */
  readonly queue: I[] = [];
  /** Number of `swapBuffers()` calls. */
  presented = 0;
  /** Number of `shouldClose()` calls. */
  closeChecks = 0;

  private currentSize: Size;
  private closed = false;
  private readonly closeAfterChecks: number | undefined;

  constructor(options: TestWindowOptions = {}) {
    this.currentSize = {
      width: options.width ?? 100,
      height: options.height ?? 100,
    };
    this.closeAfterChecks = options.closeAfterChecks;
  }

  shouldClose(): boolean {
    this.closeChecks++;
    if (this.closeAfterChecks !== undefined && this.closeChecks > this.closeAfterChecks) {
      this.closed = true;
    }
    return this.closed;
  }

  size(): Size {
    return this.currentSize;
  }

  pollEvent(): I | undefined {
    return this.queue.shift();
  }

  swapBuffers(): void {
    this.presented++;
  }

  /** Make every later `shouldClose()` return true. */
  close(): void {
    this.closed = true;
  }

  /** Change the drawable size. Zero in either dimension hides the surface. */
  setSize(width: number, height: number): void {
    this.currentSize = { width, height };
  }
}
