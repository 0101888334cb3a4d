/**
 * Loop events — the typed interface between the event loop and the application.
 *
 * The loop decides what happens next; an EventMap turns that decision
 * into the application's own event type. Applications that have no event
 * type of their own use `loopEventMap()` and the `LoopEvent` union.
 */

/** Arguments of a render event. */
export interface RenderArgs {
  /** Seconds since the last committed update, for interpolating visuals. */
  readonly extDt: number;
  /** Width of the drawable area in pixels. */
  readonly width: number;
  /** Height of the drawable area in pixels. */
  readonly height: number;
}

/** Arguments of an after-render event. Marker only. */
export interface AfterRenderArgs {
  // No fields — the frame has been presented.
}

/** Arguments of an update event. */
export interface UpdateArgs {
  /** Fixed simulation step in seconds. */
  readonly dt: number;
}

/** Arguments of an idle event. */
export interface IdleArgs {
  /** Seconds until the next scheduled render or update. */
  readonly dt: number;
}

/**
 * Maps the loop's decisions to the application's event type.
 *
 * @typeParam I - Input item type of the window.
 * @typeParam E - Event type the loop yields.
 */
export interface EventMap<I, E> {
  /** A frame should be drawn now. */
  render(args: RenderArgs): E;
  /** The frame was presented (only when buffer swapping is enabled). */
  afterRender(args: AfterRenderArgs): E;
  /** The simulation should advance by one fixed step. */
  update(args: UpdateArgs): E;
  /** An input item arrived from the window. */
  input(input: I): E;
  /** Nothing is due for a while. */
  idle(args: IdleArgs): E;
}

/** The built-in event type, tagged by `kind`. */
export type LoopEvent<I> =
  | { readonly kind: "render"; readonly args: RenderArgs }
  | { readonly kind: "afterRender"; readonly args: AfterRenderArgs }
  | { readonly kind: "update"; readonly args: UpdateArgs }
  | { readonly kind: "input"; readonly input: I }
  | { readonly kind: "idle"; readonly args: IdleArgs };

/** Every `LoopEvent` kind. */
export type LoopEventKind = LoopEvent<unknown>["kind"];

/** EventMap producing `LoopEvent` values. */
export function loopEventMap<I>(): EventMap<I, LoopEvent<I>> {
  return {
    render: (args) => ({ kind: "render", args }),
    afterRender: (args) => ({ kind: "afterRender", args }),
    update: (args) => ({ kind: "update", args }),
    input: (input) => ({ kind: "input", input }),
    idle: (args) => ({ kind: "idle", args }),
  };
}

/** Optional callbacks for each kind of `LoopEvent`. */
export interface LoopEventHandlers<I> {
  onRender?(args: RenderArgs): void;
  onAfterRender?(args: AfterRenderArgs): void;
  onUpdate?(args: UpdateArgs): void;
  onInput?(input: I): void;
  onIdle?(args: IdleArgs): void;
}

/**
 * Route a `LoopEvent` to the matching handler, if one is given.
 *
 * @example
 * ```ts
 * for (const event of loop) {
 *   dispatchLoopEvent(event, {
 *     onUpdate: ({ dt }) => world.step(dt),
 *     onRender: ({ extDt }) => draw(world, extDt),
 *   });
 * }
 * ```
 */
export function dispatchLoopEvent<I>(event: LoopEvent<I>, handlers: LoopEventHandlers<I>): void {
  switch (event.kind) {
    case "render":
      handlers.onRender?.(event.args);
      break;
    case "afterRender":
      handlers.onAfterRender?.(event.args);
      break;
    case "update":
      handlers.onUpdate?.(event.args);
      break;
    case "input":
      handlers.onInput?.(event.input);
      break;
    case "idle":
      handlers.onIdle?.(event.args);
      break;
  }
}
