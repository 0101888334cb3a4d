/**
 * BouncingBall — a one-dimensional demo simulation.
 *
 * Advanced only by fixed update steps; rendering extrapolates from the
 * last committed state without mutating it.
 */

import type { KeyInput } from "./scenarios/types.js";

/** Options for creating a BouncingBall. */
export interface BouncingBallOptions {
  /** Width of the track in pixels. */
  readonly width: number;
  /** Starting position in pixels. Defaults to 0. */
  readonly x?: number;
  /** Starting velocity in pixels per second. Defaults to 100. */
  readonly velocity?: number;
}

/** A ball bouncing between 0 and the track width. */
export class BouncingBall {
  private readonly width: number;
  private position: number;
  private speed: number;

  /**
   * @throws {Error} When the track width is not a positive finite number,
   *   or the position or velocity is not finite.
   */
  constructor(options: BouncingBallOptions) {
    if (!Number.isFinite(options.width) || options.width <= 0) {
      throw new Error(`BouncingBall width must be positive (got ${options.width})`);
    }
    if (!Number.isFinite(options.x ?? 0) || !Number.isFinite(options.velocity ?? 0)) {
      throw new Error(`BouncingBall position and velocity must be finite (got x=${options.x}, velocity=${options.velocity})`);
    }
    this.width = options.width;
    this.position = options.x ?? 0;
    this.speed = options.velocity ?? 100;
  }

  /** Committed position in pixels. */
  get x(): number {
    return this.position;
  }

  /** Velocity in pixels per second. Negative means moving left. */
  get velocity(): number {
    return this.speed;
  }

  /** Advance by one fixed step of `dt` seconds. */
  update(dt: number): void {
    this.position = this.reflect(this.position + this.speed * dt);
  }

  /**
   * Apply a key press.
   *
   * - `reverse` flips the direction.
   * - `boost` doubles the speed.
   *
   * Other keys are ignored.
   */
  handleInput(input: KeyInput): void {
    switch (input.key) {
      case "reverse":
        this.speed = -this.speed;
        break;
      case "boost":
        this.speed *= 2;
        break;
    }
  }

  /** Position to draw, `extDt` seconds after the last committed update. */
  renderX(extDt: number): number {
    return Math.min(Math.max(this.position + this.speed * extDt, 0), this.width);
  }

  /** Fold a position back onto the track, flipping direction at each wall. */
  private reflect(x: number): number {
    let folded = x;
    while (folded < 0 || folded > this.width) {
      folded = folded < 0 ? -folded : 2 * this.width - folded;
      this.speed = -this.speed;
    }
    return folded;
  }
}
