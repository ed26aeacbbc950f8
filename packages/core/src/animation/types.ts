/**
 * packages/core/src/animation/types.ts — Core animation API types.
 *
 * Why: Centralize animation configs so tweens, animated states and widget
 * helpers share consistent behavior and defaults.
 */

/** Easing function input/output in [0..1]. */
export type EasingFunction = (t: number) => number;

/** Built-in easing presets. Unsuffixed in/out variants are quadratic. */
export type EasingName =
  | "linear"
  | "easeIn"
  | "easeOut"
  | "easeInOut"
  | "easeInCubic"
  | "easeOutCubic"
  | "easeInOutCubic"
  | "bounce";

/** Easing value accepted by animation APIs. */
export type EasingInput = EasingName | EasingFunction;

/** Where animation side effects run. The App routes them through its update queue. */
export type AnimationHost = Readonly<{
  post: (run: () => void) => void;
  /** A posted side effect threw. The animation is already cancelled. */
  fail?: (error: unknown) => void;
}>;

export type AnimationCallbacks = Readonly<{
  /** Called once when the animation finishes on its own (not when cancelled). */
  onComplete?: () => void;
  /** Called with every value the animation applies. */
  onUpdate?: (value: number) => void;
}>;

/** Time-based interpolation configuration. */
export type TransitionConfig = Readonly<{
  /** Duration in milliseconds. Clamped to at least 1. */
  durationMs?: number;
  /** Easing curve name or custom easing function. */
  easing?: EasingInput;
}>;

export const DEFAULT_TRANSITION_MS = 300;
