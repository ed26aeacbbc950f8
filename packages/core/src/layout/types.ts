/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types shared by render nodes, widgets, painters and
 * the dispatcher. Widget positions are absolute (window space, before scroll).
 */

/** 2D point. */
export type Point = Readonly<{ x: number; y: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export type Circle = Readonly<{ center: Point; radius: number }>;

/** Layout axis: row (horizontal) or column (vertical) stacking. */
export type Axis = "row" | "column";

/**
 * How a widget's size is resolved along one axis.
 *
 * - `fixed`: keeps the size it was given.
 * - `expanding`: takes a flex share of the parent's remaining space.
 * - `content`: takes its measured size.
 */
export type SizePolicy = "fixed" | "expanding" | "content";

export const ZERO_POINT: Point = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });
