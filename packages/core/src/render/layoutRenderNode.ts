/**
 * packages/core/src/render/layoutRenderNode.ts — Child list with a cached z-order.
 *
 * Why: Paint and hit-test run every frame/event, z-index changes are rare. The
 * sorted order is computed once and reused until a child is added or removed,
 * or a child reports a z-index change.
 */

import { intersectRect, rect } from "../layout/geometry.js";
import type { Point, Size } from "../layout/types.js";
import { RenderNode } from "./renderNode.js";

export interface ZOrderedChild {
  getZIndex(): number;
}

/** Implemented by whatever keeps a z-order cache for its children. */
export interface ZOrderHost {
  invalidateZOrder(): void;
}

export class LayoutRenderNode<C extends ZOrderedChild> extends RenderNode implements ZOrderHost {
  private readonly items: C[] = [];
  private sortedCache: readonly C[] | null = null;
  private reversedCache: readonly C[] | null = null;

  children(): readonly C[] {
    return this.items;
  }

  get childCount(): number {
    return this.items.length;
  }

  addChild(child: C): void {
    this.items.push(child);
    this.invalidateZOrder();
    this.markLayoutDirty();
  }

  /** Returns false when the child is not present. */
  removeChild(child: C): boolean {
    const index = this.items.indexOf(child);
    if (index < 0) return false;
    this.items.splice(index, 1);
    this.invalidateZOrder();
    this.markLayoutDirty();
    return true;
  }

  clearChildren(): void {
    this.items.length = 0;
    this.invalidateZOrder();
    this.markLayoutDirty();
  }

  invalidateZOrder(): void {
    this.sortedCache = null;
    this.reversedCache = null;
  }

  isZOrderCached(): boolean {
    return this.sortedCache !== null;
  }

  /** Ascending z-index; equal z keeps insertion order. */
  paintOrder(): readonly C[] {
    if (this.sortedCache === null) {
      // Array.prototype.sort is stable.
      this.sortedCache = Object.freeze(
        this.items.slice().sort((a, b) => a.getZIndex() - b.getZIndex()),
      );
    }
    return this.sortedCache;
  }

  /** Exact reverse of paintOrder(): topmost first. */
  hitTestOrder(): readonly C[] {
    if (this.reversedCache === null) {
      this.reversedCache = Object.freeze(this.paintOrder().slice().reverse());
    }
    return this.reversedCache;
  }
}

export interface PlacedChild extends ZOrderedChild {
  getPos(): Point;
  getSize(): Size;
}

/** Layout node with a scroll offset and viewport culling. */
export class ScrollableLayoutRenderNode<C extends PlacedChild> extends LayoutRenderNode<C> {
  private offsetX = 0;
  private offsetY = 0;
  private viewport: Size | null = null;

  get scrollX(): number {
    return this.offsetX;
  }

  set scrollX(value: number) {
    if (value === this.offsetX) return;
    this.offsetX = value;
    this.markPaintDirty();
  }

  get scrollY(): number {
    return this.offsetY;
  }

  set scrollY(value: number) {
    if (value === this.offsetY) return;
    this.offsetY = value;
    this.markPaintDirty();
  }

  setViewportSize(size: Size | null): void {
    this.viewport = size;
  }

  getViewportSize(): Size {
    return this.viewport ?? this.size;
  }

  /** True when the child, shifted by the scroll offset, overlaps the viewport. */
  isChildVisible(child: C): boolean {
    const viewport = this.getViewportSize();
    const p = child.getPos();
    const s = child.getSize();
    const view = rect(this.pos.x, this.pos.y, viewport.w, viewport.h);
    const shifted = rect(p.x - this.offsetX, p.y - this.offsetY, s.w, s.h);
    return intersectRect(view, shifted) !== null;
  }

  /** Paint-ordered children that overlap the viewport. */
  visibleChildren(): readonly C[] {
    return this.paintOrder().filter((c) => this.isChildVisible(c));
  }
}
