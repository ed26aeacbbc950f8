/**
 * packages/core/src/widgets/box.ts — Overlapping children, optionally scrolled on both axes.
 *
 * Every child is placed at the box origin. Expanding axes take the box size,
 * content axes the child's measured size, fixed axes stay as they are.
 * Stacking follows z-index.
 *
 * A scrollable box scrolls whichever axis the largest child overflows. Each
 * overflowing axis gets a gutter (bottom for horizontal, right for vertical),
 * and expanding children shrink to the area left between the gutters.
 */

import type { MouseEvent, WheelEvent } from "../events.js";
import { point, rect, size } from "../layout/geometry.js";
import { type Point, type Size, type SizePolicy, ZERO_POINT } from "../layout/types.js";
import type { Painter } from "../painter.js";
import {
  type LayoutRenderNode,
  ScrollableLayoutRenderNode,
} from "../render/layoutRenderNode.js";
import { ScrollState } from "../state/state.js";
import { Layout } from "./layout.js";
import {
  SCROLLBAR_THUMB_COLOR,
  SCROLLBAR_TRACK_COLOR,
  SCROLL_BAR_SIZE,
  clampOffset,
  thumbDragDistance,
  thumbSpan,
} from "./scrollbar.js";
import type { Scrollable, Widget } from "./widget.js";

type DragAxis = "x" | "y";

function resolveExtent(policy: SizePolicy, box: number, measured: number, current: number): number {
  if (policy === "expanding") return box;
  if (policy === "content") return measured;
  return current;
}

export class Box extends Layout implements Scrollable {
  private readonly scrollNode = new ScrollableLayoutRenderNode<Widget>((painter) =>
    this.measureSelf(painter),
  );
  private scrollState: ScrollState | null = null;
  /** Largest child extent on each axis, as of the last relocation. */
  private extent: Size = size(0, 0);
  /** Height of the horizontal scrollbar along the bottom edge. */
  private bottomGutter = 0;
  /** Width of the vertical scrollbar along the right edge. */
  private rightGutter = 0;
  private dragAxis: DragAxis | null = null;
  private lastDragPos: Point | null = null;

  constructor(...children: Widget[]) {
    super();
    this.addAll(children);
  }

  protected override createLayoutNode(): LayoutRenderNode<Widget> {
    return this.scrollNode;
  }

  /** Scroll on both axes. Pass a shared state to keep the offsets across rebuilds. */
  scrollable(state: ScrollState = new ScrollState()): this {
    this.scrollState = state;
    this.model(state);
    this.markLayoutDirty();
    return this;
  }

  isScrollable(): boolean {
    return this.scrollState !== null;
  }

  getScrollState(): ScrollState | null {
    return this.scrollState;
  }

  override asScrollable(): Scrollable | null {
    return this.scrollState !== null ? this : null;
  }

  hasScrollbar(horizontal: boolean): boolean {
    return horizontal ? this.bottomGutter > 0 : this.rightGutter > 0;
  }

  override scrollOffset(): Point {
    if (this.scrollState === null) return ZERO_POINT;
    return point(this.scrollNode.scrollX, this.scrollNode.scrollY);
  }

  override contentSize(): Size {
    return size(
      Math.max(0, this.getWidth() - this.rightGutter),
      Math.max(0, this.getHeight() - this.bottomGutter),
    );
  }

  /** Largest child width and height, as of the last relocation. */
  getContentExtent(): Size {
    return this.extent;
  }

  protected override measureSelf(painter: Painter): Size {
    let w = 0;
    let h = 0;
    for (const child of this.children()) {
      const measured = child.measure(painter);
      w = Math.max(w, measured.w);
      h = Math.max(h, measured.h);
    }
    return size(w, h);
  }

  /** Size every child against `area`; returns the largest resulting extent. */
  private resizeChildren(painter: Painter, area: Size): Size {
    let w = 0;
    let h = 0;
    for (const child of this.children()) {
      const needsMeasure =
        child.getWidthPolicy() === "content" || child.getHeightPolicy() === "content";
      const measured = needsMeasure ? child.measure(painter) : child.getSize();
      child.resize(
        size(
          resolveExtent(child.getWidthPolicy(), area.w, measured.w, child.getWidth()),
          resolveExtent(child.getHeightPolicy(), area.h, measured.h, child.getHeight()),
        ),
      );
      w = Math.max(w, child.getWidth());
      h = Math.max(h, child.getHeight());
    }
    return size(w, h);
  }

  protected override relocateChildren(painter: Painter): void {
    const full = this.getSize();
    let extent = this.resizeChildren(painter, full);
    this.bottomGutter = 0;
    this.rightGutter = 0;

    if (this.scrollState !== null) {
      const children = this.children();
      // An axis on which every child expands never overflows.
      const canScrollX = children.some((c) => c.getWidthPolicy() !== "expanding");
      const canScrollY = children.some((c) => c.getHeightPolicy() !== "expanding");
      let bottom = canScrollX && extent.w > full.w ? SCROLL_BAR_SIZE : 0;
      const right = canScrollY && extent.h > full.h - bottom ? SCROLL_BAR_SIZE : 0;
      if (canScrollX && extent.w > full.w - right) bottom = SCROLL_BAR_SIZE;
      this.bottomGutter = bottom;
      this.rightGutter = right;
      if (bottom > 0 || right > 0) extent = this.resizeChildren(painter, this.contentSize());
    }
    this.extent = extent;

    this.applyScrollOffset(this.requestedOffset());
    this.scrollNode.setViewportSize(this.contentSize());

    const origin = this.getPos();
    for (const child of this.children()) child.move(origin);
  }

  private requestedOffset(): Point {
    if (this.scrollState === null) return ZERO_POINT;
    return point(this.scrollState.x, this.scrollState.y);
  }

  private maxOffset(): Point {
    const view = this.contentSize();
    return point(Math.max(0, this.extent.w - view.w), Math.max(0, this.extent.h - view.h));
  }

  private applyScrollOffset(requested: Point): void {
    const max = this.maxOffset();
    const x = clampOffset(requested.x, max.x);
    const y = clampOffset(requested.y, max.y);
    this.scrollNode.scrollX = x;
    this.scrollNode.scrollY = y;
    this.scrollState?.set({ x, y });
  }

  /** Scroll by the given deltas, each clamped to the content. */
  scrollBy(dx: number, dy: number): void {
    if (this.scrollState === null || (dx === 0 && dy === 0)) return;
    // The state notification requests the repaint.
    this.applyScrollOffset(point(this.scrollNode.scrollX + dx, this.scrollNode.scrollY + dy));
  }

  protected override paintOrder(): readonly Widget[] {
    if (this.scrollState === null) return super.paintOrder();
    return this.scrollNode.visibleChildren();
  }

  override redraw(painter: Painter, completely: boolean): void {
    const full = completely || this.isDirty();
    super.redraw(painter, completely);
    if (full) this.paintScrollbars(painter);
  }

  private paintScrollbars(painter: Painter): void {
    const view = this.contentSize();
    if (this.bottomGutter > 0) {
      const thumb = thumbSpan(this.scrollNode.scrollX, view.w, this.extent.w);
      painter.style({ fill: { color: SCROLLBAR_TRACK_COLOR } });
      painter.fillRect(rect(0, view.h, view.w, this.bottomGutter));
      painter.style({ fill: { color: SCROLLBAR_THUMB_COLOR } });
      painter.fillRect(rect(thumb.start, view.h, thumb.length, this.bottomGutter));
    }
    if (this.rightGutter > 0) {
      const thumb = thumbSpan(this.scrollNode.scrollY, view.h, this.extent.h);
      painter.style({ fill: { color: SCROLLBAR_TRACK_COLOR } });
      painter.fillRect(rect(view.w, 0, this.rightGutter, view.h));
      painter.style({ fill: { color: SCROLLBAR_THUMB_COLOR } });
      painter.fillRect(rect(view.w, thumb.start, this.rightGutter, thumb.length));
    }
  }

  private thumbAt(local: Point): DragAxis | null {
    const view = this.contentSize();
    if (this.bottomGutter > 0 && local.y >= view.h && local.x < view.w) {
      const thumb = thumbSpan(this.scrollNode.scrollX, view.w, this.extent.w);
      if (local.x >= thumb.start && local.x <= thumb.start + thumb.length) return "x";
    }
    if (this.rightGutter > 0 && local.x >= view.w && local.y < view.h) {
      const thumb = thumbSpan(this.scrollNode.scrollY, view.h, this.extent.h);
      if (local.y >= thumb.start && local.y <= thumb.start + thumb.length) return "y";
    }
    return null;
  }

  override mouseWheel(ev: WheelEvent): void {
    this.scrollBy(ev.dx, ev.dy);
  }

  override mouseDown(ev: MouseEvent): void {
    this.dragAxis = this.thumbAt(ev.pos);
    this.lastDragPos = this.dragAxis !== null ? ev.pos : null;
  }

  override mouseDrag(ev: MouseEvent): void {
    const last = this.lastDragPos;
    if (this.dragAxis === null || last === null) return;
    this.lastDragPos = ev.pos;
    const view = this.contentSize();
    if (this.dragAxis === "x") {
      this.scrollBy(thumbDragDistance(ev.pos.x - last.x, view.w, this.extent.w), 0);
    } else {
      this.scrollBy(0, thumbDragDistance(ev.pos.y - last.y, view.h, this.extent.h));
    }
  }

  override mouseUp(_ev: MouseEvent): void {
    this.dragAxis = null;
    this.lastDragPos = null;
  }
}
