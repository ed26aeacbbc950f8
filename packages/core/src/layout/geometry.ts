/**
 * packages/core/src/layout/geometry.ts — Point/size/rect helpers.
 */

import type { Axis, Point, Rect, Size } from "./types.js";

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

export function size(w: number, h: number): Size {
  return Object.freeze({ w, h });
}

export function rect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({ x, y, w, h });
}

export function addPoints(a: Point, b: Point): Point {
  return point(a.x + b.x, a.y + b.y);
}

export function subPoints(a: Point, b: Point): Point {
  return point(a.x - b.x, a.y - b.y);
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function sizesEqual(a: Size, b: Size): boolean {
  return a.w === b.w && a.h === b.h;
}

/**
 * Strict containment: a point on any edge of the box is outside.
 * Adjacent widgets therefore never both claim a shared border point.
 */
export function containsStrict(origin: Point, extent: Size, p: Point): boolean {
  return (
    origin.x < p.x && p.x < origin.x + extent.w && origin.y < p.y && p.y < origin.y + extent.h
  );
}

/** Intersection of two rects, or null when they do not overlap. */
export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return rect(x0, y0, x1 - x0, y1 - y0);
}

/** Main-axis extent of a size: width for rows, height for columns. */
export function mainOf(axis: Axis, s: Size): number {
  return axis === "row" ? s.w : s.h;
}

export function crossOf(axis: Axis, s: Size): number {
  return axis === "row" ? s.h : s.w;
}

/** Build a size from main/cross extents along an axis. */
export function sizeOnAxis(axis: Axis, main: number, cross: number): Size {
  return axis === "row" ? size(main, cross) : size(cross, main);
}
