/**
 * packages/core/src/widgets/linear.ts — Row and Column.
 *
 * Why: Children are placed one after another along the main axis. Fixed and
 * content children keep their main size, expanding children share what is left
 * by flex weight (see layout/engine/flex.ts). A scrollable row/column keeps its
 * offset in a ScrollState so it survives component rebuilds.
 */

import { LatticeError } from "../errors.js";
import type { MouseEvent, WheelEvent } from "../events.js";
import { resolveFlexSizes, type FlexSlot } from "../layout/engine/flex.js";
import { crossOf, mainOf, point, rect, sizeOnAxis } from "../layout/geometry.js";
import { type Axis, type Point, type Size, type SizePolicy, ZERO_POINT } from "../layout/types.js";
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
  type ThumbSpan,
  clampOffset,
  thumbDragDistance,
  thumbSpan,
} from "./scrollbar.js";
import type { Scrollable, Widget } from "./widget.js";

export abstract class LinearLayout extends Layout implements Scrollable {
  protected abstract readonly axis: Axis;

  private readonly scrollNode = new ScrollableLayoutRenderNode<Widget>((painter) =>
    this.measureSelf(painter),
  );
  private gap = 0;
  private scrollState: ScrollState | null = null;
  private contentMain = 0;
  private gutter = 0;
  private thumbDragFrom: number | null = null;

  protected override createLayoutNode(): LayoutRenderNode<Widget> {
    return this.scrollNode;
  }

  /** Insert `n` units before, between and after children. */
  spacing(n: number): this {
    if (!Number.isFinite(n) || n < 0) {
      throw new LatticeError(
        "LUI_INVALID_SIZE_POLICY",
        `spacing must be a finite number >= 0, got ${String(n)}`,
      );
    }
    if (n !== this.gap) {
      this.gap = n;
      this.markLayoutDirty();
    }
    return this;
  }

  getSpacing(): number {
    return this.gap;
  }

  /**
   * Scroll along the main axis. Pass a shared state to keep the offset across
   * rebuilds.
   */
  scrollable(state: ScrollState = new ScrollState()): this {
    const expanding = this.children().find((c) => this.mainPolicyOf(c) === "expanding");
    if (expanding !== undefined) {
      throw new LatticeError(
        "LUI_INVALID_SIZE_POLICY",
        `a scrollable ${this.axis} cannot hold children that expand along it`,
      );
    }
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

  protected override validateChild(child: Widget): void {
    super.validateChild(child);
    if (this.scrollState !== null && this.mainPolicyOf(child) === "expanding") {
      throw new LatticeError(
        "LUI_INVALID_SIZE_POLICY",
        `a scrollable ${this.axis} cannot hold children that expand along it`,
      );
    }
  }

  override asScrollable(): Scrollable | null {
    return this.scrollState !== null ? this : null;
  }

  hasScrollbar(horizontal: boolean): boolean {
    return this.gutter > 0 && horizontal === (this.axis === "row");
  }

  override scrollOffset(): Point {
    if (this.scrollState === null) return ZERO_POINT;
    return this.axis === "row" ? point(this.scrollNode.scrollX, 0) : point(0, this.scrollNode.scrollY);
  }

  override contentSize(): Size {
    const s = this.getSize();
    return sizeOnAxis(this.axis, mainOf(this.axis, s), Math.max(0, crossOf(this.axis, s) - this.gutter));
  }

  /** Main-axis extent of all children plus spacing, as of the last relocation. */
  getContentExtent(): number {
    return this.contentMain;
  }

  private mainPolicyOf(child: Widget): SizePolicy {
    return this.axis === "row" ? child.getWidthPolicy() : child.getHeightPolicy();
  }

  private crossPolicyOf(child: Widget): SizePolicy {
    return this.axis === "row" ? child.getHeightPolicy() : child.getWidthPolicy();
  }

  private totalGap(count: number): number {
    return count === 0 ? 0 : this.gap * (count + 1);
  }

  protected override measureSelf(painter: Painter): Size {
    const children = this.children();
    let main = this.totalGap(children.length);
    let cross = 0;
    for (const child of children) {
      const measured = child.measure(painter);
      main += mainOf(this.axis, measured);
      cross = Math.max(cross, crossOf(this.axis, measured));
    }
    return sizeOnAxis(this.axis, main, cross);
  }

  protected override relocateChildren(painter: Painter): void {
    const axis = this.axis;
    const children = this.children();
    const viewportMain = mainOf(axis, this.getSize());
    const fullCross = crossOf(axis, this.getSize());
    const gaps = this.totalGap(children.length);

    const slots: FlexSlot[] = children.map((child) => {
      const policy = this.mainPolicyOf(child);
      let main = 0;
      if (policy === "content") main = mainOf(axis, child.measure(painter));
      else if (policy === "fixed") main = mainOf(axis, child.getSize());
      return { policy, size: main, flex: child.getFlex() };
    });
    const { sizes } = resolveFlexSizes(viewportMain - gaps, slots);

    let contentMain = gaps;
    for (const s of sizes) contentMain += s;
    this.contentMain = contentMain;
    this.gutter = this.scrollState !== null && contentMain > viewportMain ? SCROLL_BAR_SIZE : 0;
    const childCross = Math.max(0, fullCross - this.gutter);

    this.applyScrollOffset(this.requestedOffset());
    this.scrollNode.setViewportSize(this.contentSize());

    const origin = this.getPos();
    let cursor = this.mainOfPoint(origin) + this.gap;
    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      if (child === undefined) continue;
      const main = sizes[i] ?? 0;
      const crossPolicy = this.crossPolicyOf(child);
      let cross = crossOf(axis, child.getSize());
      if (crossPolicy === "expanding") cross = childCross;
      else if (crossPolicy === "content") cross = crossOf(axis, child.measure(painter));

      child.resize(sizeOnAxis(axis, main, cross));
      child.move(axis === "row" ? point(cursor, origin.y) : point(origin.x, cursor));
      cursor += main + this.gap;
    }
  }

  private requestedOffset(): number {
    if (this.scrollState === null) return 0;
    return this.axis === "row" ? this.scrollState.x : this.scrollState.y;
  }

  private maxOffset(): number {
    return Math.max(0, this.contentMain - mainOf(this.axis, this.getSize()));
  }

  private applyScrollOffset(requested: number): void {
    const offset = clampOffset(requested, this.maxOffset());
    if (this.axis === "row") this.scrollNode.scrollX = offset;
    else this.scrollNode.scrollY = offset;
    if (this.scrollState !== null) {
      this.scrollState.set(this.axis === "row" ? { x: offset } : { y: offset });
    }
  }

  /** Scroll by `delta` along the main axis, clamped to the content. */
  scrollBy(delta: number): void {
    if (this.scrollState === null || delta === 0) return;
    const current = this.axis === "row" ? this.scrollNode.scrollX : this.scrollNode.scrollY;
    // The state notification requests the repaint.
    this.applyScrollOffset(current + delta);
  }

  protected override paintOrder(): readonly Widget[] {
    if (this.scrollState === null) return super.paintOrder();
    return this.scrollNode.visibleChildren();
  }

  override redraw(painter: Painter, completely: boolean): void {
    const full = completely || this.isDirty();
    super.redraw(painter, completely);
    if (full && this.gutter > 0) this.paintScrollbar(painter);
  }

  private thumb(): ThumbSpan {
    const offset = this.axis === "row" ? this.scrollNode.scrollX : this.scrollNode.scrollY;
    return thumbSpan(offset, mainOf(this.axis, this.getSize()), this.contentMain);
  }

  private paintScrollbar(painter: Painter): void {
    const w = this.getWidth();
    const h = this.getHeight();
    const thumb = this.thumb();
    painter.style({ fill: { color: SCROLLBAR_TRACK_COLOR } });
    if (this.axis === "row") {
      painter.fillRect(rect(0, h - this.gutter, w, this.gutter));
      painter.style({ fill: { color: SCROLLBAR_THUMB_COLOR } });
      painter.fillRect(rect(thumb.start, h - this.gutter, thumb.length, this.gutter));
    } else {
      painter.fillRect(rect(w - this.gutter, 0, this.gutter, h));
      painter.style({ fill: { color: SCROLLBAR_THUMB_COLOR } });
      painter.fillRect(rect(w - this.gutter, thumb.start, this.gutter, thumb.length));
    }
  }

  private isOnThumb(local: Point): boolean {
    if (this.gutter === 0) return false;
    const cross = this.axis === "row" ? local.y : local.x;
    if (cross < crossOf(this.axis, this.getSize()) - this.gutter) return false;
    const main = this.mainOfPoint(local);
    const thumb = this.thumb();
    return main >= thumb.start && main <= thumb.start + thumb.length;
  }

  private mainOfPoint(p: Point): number {
    return this.axis === "row" ? p.x : p.y;
  }

  override mouseWheel(ev: WheelEvent): void {
    this.scrollBy(this.axis === "row" ? ev.dx : ev.dy);
  }

  override mouseDown(ev: MouseEvent): void {
    this.thumbDragFrom = this.isOnThumb(ev.pos) ? this.mainOfPoint(ev.pos) : null;
  }

  override mouseDrag(ev: MouseEvent): void {
    if (this.thumbDragFrom === null) return;
    const at = this.mainOfPoint(ev.pos);
    const delta = at - this.thumbDragFrom;
    this.thumbDragFrom = at;
    this.scrollBy(thumbDragDistance(delta, mainOf(this.axis, this.getSize()), this.contentMain));
  }

  override mouseUp(_ev: MouseEvent): void {
    this.thumbDragFrom = null;
  }
}

/** Lays children out left to right. */
export class Row extends LinearLayout {
  protected override readonly axis: Axis = "row";

  constructor(...children: Widget[]) {
    super();
    this.addAll(children);
  }
}

/** Lays children out top to bottom. */
export class Column extends LinearLayout {
  protected override readonly axis: Axis = "column";

  constructor(...children: Widget[]) {
    super();
    this.addAll(children);
  }
}
