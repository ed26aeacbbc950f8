/**
 * packages/core/src/render/renderNode.ts — Per-widget layout/paint cache.
 *
 * Why: A widget is only re-measured when its layout is dirty and only repainted
 * when its paint is dirty. Dirty flags start set and are cleared after the node
 * has been painted.
 */

import { pointsEqual, sizesEqual } from "../layout/geometry.js";
import { type Point, type Size, ZERO_POINT, ZERO_SIZE } from "../layout/types.js";
import type { Painter } from "../painter.js";

export type Measurer = (painter: Painter) => Size;

export class RenderNode {
  private layoutDirty = true;
  private paintDirty = true;
  private cachedMeasure: Size | null = null;
  private position: Point = ZERO_POINT;
  private extent: Size = ZERO_SIZE;
  private readonly measurer: Measurer;

  constructor(measurer: Measurer) {
    this.measurer = measurer;
  }

  /** Layout changes always require a repaint: sets both flags and drops the cached measurement. */
  markLayoutDirty(): void {
    this.layoutDirty = true;
    this.paintDirty = true;
    this.cachedMeasure = null;
  }

  markPaintDirty(): void {
    this.paintDirty = true;
  }

  /** Call only after the node has been painted. */
  clearDirty(): void {
    this.layoutDirty = false;
    this.paintDirty = false;
  }

  isLayoutDirty(): boolean {
    return this.layoutDirty;
  }

  isPaintDirty(): boolean {
    return this.paintDirty;
  }

  /** Cached measurement; recomputed while the layout is dirty or after invalidation. */
  measure(painter: Painter): Size {
    if (this.cachedMeasure !== null && !this.layoutDirty) {
      return this.cachedMeasure;
    }
    const measured = this.measurer(painter);
    this.cachedMeasure = measured;
    return measured;
  }

  hasCachedMeasure(): boolean {
    return this.cachedMeasure !== null;
  }

  get pos(): Point {
    return this.position;
  }

  get size(): Size {
    return this.extent;
  }

  /** Returns true (and marks layout dirty) only when the position changed. */
  setPos(pos: Point): boolean {
    if (pointsEqual(this.position, pos)) return false;
    this.position = pos;
    this.markLayoutDirty();
    return true;
  }

  /** Returns true (and marks layout dirty) only when the size changed. */
  setSize(size: Size): boolean {
    if (sizesEqual(this.extent, size)) return false;
    this.extent = size;
    this.markLayoutDirty();
    return true;
  }
}
