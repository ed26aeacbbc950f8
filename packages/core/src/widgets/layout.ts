/**
 * packages/core/src/widgets/layout.ts — Containers.
 *
 * Why: A layout owns its children, resolves their geometry on every paint
 * (`relocateChildren`) and paints them in z-order, each translated to its own
 * origin and clipped to its own size. Hit testing walks the same z-order in
 * reverse so the topmost child wins.
 */

import { LatticeError } from "../errors.js";
import { addPoints, containsStrict, point, rect, subPoints } from "../layout/geometry.js";
import { type Point, type Size, type SizePolicy, ZERO_POINT } from "../layout/types.js";
import type { Color, Painter } from "../painter.js";
import { LayoutRenderNode } from "../render/layoutRenderNode.js";
import type { RenderNode } from "../render/renderNode.js";
import { type DispatchResult, Widget } from "./widget.js";

function invalidPolicy(detail: string): never {
  throw new LatticeError("LUI_INVALID_SIZE_POLICY", detail);
}

export abstract class Layout extends Widget {
  private zNode: LayoutRenderNode<Widget> | null = null;
  private background: Color | null = null;

  /** Resolve sizes and positions of every child. Runs before each paint of this layout. */
  protected abstract relocateChildren(painter: Painter): void;

  get layoutNode(): LayoutRenderNode<Widget> {
    if (this.zNode === null) {
      this.zNode = this.createLayoutNode();
    }
    return this.zNode;
  }

  protected createLayoutNode(): LayoutRenderNode<Widget> {
    return new LayoutRenderNode<Widget>((painter) => this.measureSelf(painter));
  }

  protected override createRenderNode(): RenderNode {
    return this.layoutNode;
  }

  children(): readonly Widget[] {
    return this.layoutNode.children();
  }

  override childWidgets(): readonly Widget[] {
    return this.layoutNode.children();
  }

  /**
   * Append a child. A child that still belongs to another layout is removed from
   * it first.
   */
  add(child: Widget): this {
    if (child.parent === this) return this;
    this.validateChild(child);
    const previous = child.parent;
    if (previous !== null) previous.remove(child);
    this.layoutNode.addChild(child);
    child.mount(this);
    return this;
  }

  addAll(children: Iterable<Widget>): this {
    for (const child of children) this.add(child);
    return this;
  }

  /** Unmount (unless cached) and forget `child`. Does not detach it. */
  remove(child: Widget): this {
    if (!this.layoutNode.removeChild(child)) return this;
    child.unmount();
    child.clearParent();
    return this;
  }

  clear(): this {
    for (const child of this.children().slice()) this.remove(child);
    return this;
  }

  override detach(): void {
    if (this.isCached()) return;
    super.detach();
    if (this.isFrozen()) return;
    for (const child of this.children().slice()) child.detach();
  }

  /** Content-sized axes cannot hold expanding children. */
  protected validateChild(child: Widget): void {
    if (this.getWidthPolicy() === "content" && child.getWidthPolicy() === "expanding") {
      invalidPolicy("a layout with content width cannot hold a width-expanding child");
    }
    if (this.getHeightPolicy() === "content" && child.getHeightPolicy() === "expanding") {
      invalidPolicy("a layout with content height cannot hold a height-expanding child");
    }
  }

  override widthPolicy(policy: SizePolicy): this {
    if (policy === "content" && this.children().some((c) => c.getWidthPolicy() === "expanding")) {
      invalidPolicy("content width is not allowed while a child expands horizontally");
    }
    return super.widthPolicy(policy);
  }

  override heightPolicy(policy: SizePolicy): this {
    if (policy === "content" && this.children().some((c) => c.getHeightPolicy() === "expanding")) {
      invalidPolicy("content height is not allowed while a child expands vertically");
    }
    return super.heightPolicy(policy);
  }

  /** Fill color painted under the children. */
  bg(color: Color | null): this {
    this.background = color;
    this.markPaintDirty();
    return this;
  }

  /** Offset added to points before probing children. Zero unless scrolled. */
  scrollOffset(): Point {
    return ZERO_POINT;
  }

  /** Part of the layout that shows children (excludes scrollbar gutters). */
  contentSize(): Size {
    return this.getSize();
  }

  override redraw(painter: Painter, completely: boolean): void {
    // Repainting the background wipes the children, so they all repaint with it.
    const full = completely || this.isDirty();
    if (full) this.paintBackground(painter);
    this.relocateChildren(painter);
    this.redrawChildren(painter, full);
  }

  protected paintBackground(painter: Painter): void {
    if (this.background === null) return;
    painter.style({ fill: { color: this.background } });
    painter.fillRect(rect(0, 0, this.getWidth(), this.getHeight()));
  }

  /** Children to paint, lowest z first. */
  protected paintOrder(): readonly Widget[] {
    return this.layoutNode.paintOrder();
  }

  protected redrawChildren(painter: Painter, completely: boolean): void {
    const origin = this.getPos();
    const scroll = this.scrollOffset();
    for (const child of this.paintOrder()) {
      if (!completely && !child.isDirty()) continue;
      painter.save();
      try {
        painter.translate(
          point(child.getX() - origin.x - scroll.x, child.getY() - origin.y - scroll.y),
        );
        painter.clip(rect(0, 0, child.getWidth(), child.getHeight()));
        child.redraw(painter, completely);
      } finally {
        painter.restore();
      }
      child.setDirty(false);
    }
  }

  override dispatch(p: Point): DispatchResult | null {
    if (containsStrict(this.getPos(), this.contentSize(), p)) {
      const shifted = addPoints(p, this.scrollOffset());
      for (const child of this.layoutNode.hitTestOrder()) {
        const hit = child.dispatch(shifted);
        if (hit !== null) return hit;
      }
      return Object.freeze({ target: this, pos: subPoints(shifted, this.getPos()) });
    }
    return super.dispatch(p);
  }

  /** Deepest descendant (or this layout) with a scrollbar on the requested axis. */
  override dispatchToScrollable(p: Point, horizontal: boolean): DispatchResult | null {
    if (!this.contain(p)) return null;
    const shifted = addPoints(p, this.scrollOffset());
    for (const child of this.layoutNode.hitTestOrder()) {
      const hit = child.dispatchToScrollable(shifted, horizontal);
      if (hit !== null) return hit;
    }
    if (this.asScrollable()?.hasScrollbar(horizontal) === true) {
      return Object.freeze({ target: this, pos: subPoints(p, this.getPos()) });
    }
    return null;
  }
}
