/**
 * packages/core/src/animation/interpolate.ts — Primitive interpolation helpers.
 */

import { point, size } from "../layout/geometry.js";
import type { Point, Size } from "../layout/types.js";

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/** Clamp an animation duration to at least 1 ms; non-finite input takes the fallback. */
export function normalizeDurationMs(durationMs: number | undefined, fallbackMs: number): number {
  if (durationMs === undefined) return fallbackMs;
  if (!Number.isFinite(durationMs)) return fallbackMs;
  return Math.max(1, durationMs);
}

/** Linear interpolation between two numeric values. */
export function interpolateNumber(from: number, to: number, t: number): number {
  return from + (to - from) * clamp01(t);
}

/** Rounded linear interpolation, for integer-valued targets. */
export function interpolateInt(from: number, to: number, t: number): number {
  return Math.round(interpolateNumber(from, to, t));
}

export function interpolatePoint(from: Point, to: Point, t: number): Point {
  return point(interpolateNumber(from.x, to.x, t), interpolateNumber(from.y, to.y, t));
}

export function interpolateSize(from: Size, to: Size, t: number): Size {
  return size(interpolateNumber(from.w, to.w, t), interpolateNumber(from.h, to.h, t));
}
