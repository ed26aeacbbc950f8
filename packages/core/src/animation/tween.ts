/**
 * packages/core/src/animation/tween.ts — Time-based numeric tweens.
 *
 * A tween accumulates elapsed time, eases `elapsed / duration` and writes the
 * interpolated value to its target. It reports completion on the tick where
 * progress reaches 1.
 */

import { Animation } from "./animation.js";
import { resolveEasing } from "./easing.js";
import { interpolateNumber, normalizeDurationMs } from "./interpolate.js";
import {
  type AnimationCallbacks,
  DEFAULT_TRANSITION_MS,
  type EasingFunction,
  type TransitionConfig,
} from "./types.js";

export type TweenProperty = "x" | "y" | "width" | "height";

/** Widget surface a tween writes to. */
export interface TweenableWidget {
  moveX(x: number): unknown;
  moveY(y: number): unknown;
  setWidth(w: number): unknown;
  setHeight(h: number): unknown;
  update(completely?: boolean): void;
}

export type TweenTarget =
  | Readonly<{ widget: TweenableWidget; property: TweenProperty }>
  | ((value: number) => void);

export type TweenOptions = TransitionConfig &
  AnimationCallbacks &
  Readonly<{
    from: number;
    to: number;
  }>;

export function applyTweenProperty(
  widget: TweenableWidget,
  property: TweenProperty,
  value: number,
): void {
  switch (property) {
    case "x":
      widget.moveX(value);
      break;
    case "y":
      widget.moveY(value);
      break;
    case "width":
      widget.setWidth(value);
      break;
    case "height":
      widget.setHeight(value);
      break;
  }
  widget.update();
}

/** Tween without a target; read `currentValue` or listen through onUpdate. */
export class ValueTween extends Animation {
  readonly from: number;
  readonly to: number;
  readonly durationMs: number;
  private readonly easing: EasingFunction;
  private elapsed = 0;
  private progressValue = 0;
  private value: number;

  constructor(options: TweenOptions) {
    super(options);
    this.from = options.from;
    this.to = options.to;
    this.durationMs = normalizeDurationMs(options.durationMs, DEFAULT_TRANSITION_MS);
    this.easing = resolveEasing(options.easing);
    this.value = options.from;
  }

  get progress(): number {
    return this.progressValue;
  }

  get elapsedMs(): number {
    return this.elapsed;
  }

  get currentValue(): number {
    return this.value;
  }

  tick(dtMs: number): boolean {
    if (this.cancelled) return true;
    this.elapsed += Number.isFinite(dtMs) && dtMs > 0 ? dtMs : 0;
    const progress = Math.min(1, this.elapsed / this.durationMs);
    this.progressValue = progress;
    const value = interpolateNumber(this.from, this.to, this.easing(progress));
    this.value = value;
    this.post(() => {
      this.applyValue(value);
      this.onUpdateCallback?.(value);
    });
    return progress >= 1;
  }

  protected applyValue(_value: number): void {}
}

export class Tween extends ValueTween {
  private readonly target: TweenTarget;

  constructor(target: TweenTarget, options: TweenOptions) {
    super(options);
    this.target = target;
  }

  protected override applyValue(value: number): void {
    if (typeof this.target === "function") {
      this.target(value);
      return;
    }
    applyTweenProperty(this.target.widget, this.target.property, value);
  }
}
