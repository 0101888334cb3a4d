/**
 * Window capability — what the event loop needs from a windowing backend.
 *
 * The loop only calls these methods; it never creates, owns or closes a
 * window. Access is scoped to a single phase transition and released
 * before an event is handed back to the caller, so the caller may use
 * the same window freely between pulls.
 *
 * Backends must be driven from the thread that owns their event source.
 */

/** Drawable size in pixels. A zero dimension means the surface is not ready. */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/**
 * A window (or any surface) the loop renders into and reads input from.
 *
 * @typeParam I - The input item type produced by `pollEvent()`.
 */
export interface Window<I> {
  /** Whether the loop should stop. Checked before every render attempt. */
  shouldClose(): boolean;
  /** Current drawable size. */
  size(): Size;
  /** Next queued input item, or `undefined` when none is pending. Must not block. */
  pollEvent(): I | undefined;
  /** Present the frame drawn since the last render event. */
  swapBuffers(): void;
}
