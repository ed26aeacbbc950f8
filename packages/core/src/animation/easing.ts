/**
 * packages/core/src/animation/easing.ts — Easing curve helpers.
 */

import { clamp01 } from "./interpolate.js";
import type { EasingFunction, EasingInput, EasingName } from "./types.js";

const bounce = (t: number): number => {
  if (t < 1 / 2.75) return 7.5625 * t * t;
  if (t < 2 / 2.75) {
    const shifted = t - 1.5 / 2.75;
    return 7.5625 * shifted * shifted + 0.75;
  }
  if (t < 2.5 / 2.75) {
    const shifted = t - 2.25 / 2.75;
    return 7.5625 * shifted * shifted + 0.9375;
  }
  const shifted = t - 2.625 / 2.75;
  return 7.5625 * shifted * shifted + 0.984375;
};

const EASING_PRESETS: Readonly<Record<EasingName, EasingFunction>> = Object.freeze({
  linear: (t: number): number => t,
  easeIn: (t: number): number => t * t,
  easeOut: (t: number): number => 1 - (1 - t) * (1 - t),
  easeInOut: (t: number): number => (t < 0.5 ? 2 * t * t : 1 - (-2 * t + 2) ** 2 / 2),
  easeInCubic: (t: number): number => t * t * t,
  easeOutCubic: (t: number): number => 1 - (1 - t) ** 3,
  easeInOutCubic: (t: number): number => (t < 0.5 ? 4 * t * t * t : 1 - (-2 * t + 2) ** 3 / 2),
  bounce,
});

export const EASING_NAMES: readonly EasingName[] = Object.freeze(
  Object.keys(EASING_PRESETS).filter((name): name is EasingName => name in EASING_PRESETS),
);

/** Resolve user-provided easing value to a safe function with clamped input and output. */
export function resolveEasing(input: EasingInput | undefined): EasingFunction {
  if (typeof input === "function") {
    return (t: number): number => clamp01(input(clamp01(t)));
  }
  const preset = (input ? EASING_PRESETS[input] : undefined) ?? EASING_PRESETS.linear;
  return (t: number): number => clamp01(preset(clamp01(t)));
}
