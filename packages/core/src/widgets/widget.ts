/**
 * packages/core/src/widgets/widget.ts — Base class of the retained widget tree.
 *
 * Why: A widget keeps its geometry, sizing policies and dirty state across
 * frames. Parents own their children; a child only points back at its parent.
 * Positions are absolute (window space, before scrolling); painting happens in
 * local coordinates.
 *
 * Lifecycle: unmounted → mounted (onMount once) → unmounted (onUnmount once).
 * Cached widgets skip unmount/detach so a component rebuild can reuse them.
 */

import type { Animation } from "../animation/animation.js";
import { Tween, type TweenProperty } from "../animation/tween.js";
import type { AnimationCallbacks, TransitionConfig } from "../animation/types.js";
import { LatticeError } from "../errors.js";
import type { InputCharEvent, InputKeyEvent, MouseEvent, WheelEvent } from "../events.js";
import { containsStrict, point, size, subPoints } from "../layout/geometry.js";
import type { Point, Size, SizePolicy } from "../layout/types.js";
import type { Painter } from "../painter.js";
import { RenderNode } from "../render/renderNode.js";
import type { UiContext } from "../runtime/context.js";
import type { ArenaMember } from "../runtime/widgetArena.js";
import type { Observable, Observer } from "../state/observable.js";
import type { Layout } from "./layout.js";

/** Hit-test result: the target and the point in its local coordinates. */
export type DispatchResult = Readonly<{ target: Widget; pos: Point }>;

/** Capability of containers that scroll their content. */
export interface Scrollable {
  hasScrollbar(horizontal: boolean): boolean;
  scrollOffset(): Point;
}

/** Capability of widgets that take keyboard focus. */
export interface Focusable {
  canFocus(): boolean;
  /** Tab order; lower comes first, ties keep tree order. */
  focusOrder(): number;
}

export type SlideDirection = "left" | "right" | "top" | "bottom";

export type AnimateToTarget = Readonly<{
  x?: number;
  y?: number;
  width?: number;
  height?: number;
}>;

export type WidgetAnimationOptions = TransitionConfig & Pick<AnimationCallbacks, "onComplete">;

export type SlideOptions = WidgetAnimationOptions &
  Readonly<{
    /** Travel distance. Defaults to the widget's extent along the slide axis. */
    distance?: number;
  }>;

let nextWidgetId = 1;

export abstract class Widget implements Observer, ArenaMember {
  readonly id: number = nextWidgetId++;
  private generation = 0;
  private parentRef: Layout | null = null;
  private rootContext: UiContext | null = null;
  private node: RenderNode | null = null;
  private mounted = false;
  private cached = false;
  private detachable = true;
  private widthPolicyValue: SizePolicy = "expanding";
  private heightPolicyValue: SizePolicy = "expanding";
  private flexValue = 1;
  private zIndexValue = 1;
  private tabIndexValue = 0;
  private readonly observed = new Set<Observable>();
  private modelState: Observable | null = null;

  /** Paint in local coordinates; the painter is already translated and clipped. */
  abstract redraw(painter: Painter, completely: boolean): void;

  /* --- Render node --- */

  get renderNode(): RenderNode {
    if (this.node === null) {
      this.node = this.createRenderNode();
    }
    return this.node;
  }

  protected createRenderNode(): RenderNode {
    return new RenderNode((painter) => this.measureSelf(painter));
  }

  /* --- Tree --- */

  get parent(): Layout | null {
    return this.parentRef;
  }

  /** Direct children; empty for leaf widgets. */
  childWidgets(): readonly Widget[] {
    return [];
  }

  /** Root depth is 0. */
  getDepth(): number {
    let depth = 0;
    for (let p = this.parentRef; p !== null; p = p.parentRef) depth++;
    return depth;
  }

  /** Services of the App this widget is attached to, or null when detached from any App. */
  get context(): UiContext | null {
    for (let w: Widget | null = this; w !== null; w = w.parentRef) {
      if (w.rootContext !== null) return w.rootContext;
    }
    return null;
  }

  /** Installed by the App on its root widget. */
  attachContext(context: UiContext | null): void {
    this.rootContext = context;
  }

  mount(parent: Layout | null): void {
    this.parentRef = parent;
    if (this.mounted) return;
    this.mounted = true;
    this.onMount();
  }

  unmount(): void {
    if (this.cached || !this.mounted) return;
    this.mounted = false;
    this.onUnmount();
  }

  /** Called by a Layout when the widget leaves its child list. */
  clearParent(): void {
    this.parentRef = null;
  }

  /**
   * Unmount, stop observing state (unless frozen) and invalidate every handle
   * taken on this widget. No-op for cached widgets.
   */
  detach(): void {
    if (this.cached) return;
    this.unmount();
    if (this.detachable) {
      for (const observable of Array.from(this.observed)) {
        observable.detach(this);
      }
    }
    this.generation++;
  }

  isMounted(): boolean {
    return this.mounted;
  }

  getGeneration(): number {
    return this.generation;
  }

  isCached(): boolean {
    return this.cached;
  }

  setCached(cached: boolean): void {
    this.cached = cached;
  }

  /** Keep state subscriptions alive across detach. */
  freeze(): this {
    this.detachable = false;
    return this;
  }

  isFrozen(): boolean {
    return !this.detachable;
  }

  protected onMount(): void {}

  protected onUnmount(): void {}

  /* --- Observation --- */

  onAttach(observable: Observable): void {
    this.observed.add(observable);
  }

  onDetach(observable: Observable): void {
    this.observed.delete(observable);
  }

  onNotify(): void {
    this.markLayoutDirty();
    this.update();
  }

  /** Observe `state`, replacing the previously modelled state. */
  model(state: Observable): this {
    if (this.modelState === state) return this;
    this.modelState?.detach(this);
    this.modelState = state;
    state.attach(this);
    return this;
  }

  observedCount(): number {
    return this.observed.size;
  }

  /* --- Dirty state --- */

  markLayoutDirty(): void {
    this.renderNode.markLayoutDirty();
  }

  markPaintDirty(): void {
    this.renderNode.markPaintDirty();
  }

  /** Layout-dirty implies paint-dirty, so this covers both. */
  isDirty(): boolean {
    return this.renderNode.isPaintDirty();
  }

  isLayoutDirty(): boolean {
    return this.renderNode.isLayoutDirty();
  }

  /** `false` clears both flags and must only follow a paint of this widget. */
  setDirty(dirty: boolean): void {
    if (dirty) {
      this.markPaintDirty();
    } else {
      this.renderNode.clearDirty();
    }
  }

  /**
   * Queue a repaint. Inside a scrollable container or stateful component the
   * outermost such ancestor is repainted completely instead.
   */
  update(completely = false): void {
    const context = this.context;
    if (context === null) return;
    let unitRoot: Widget | null = null;
    for (let w: Widget | null = this; w !== null; w = w.parentRef) {
      if (w.repaintsAsUnit()) unitRoot = w;
    }
    if (unitRoot !== null) {
      context.requestRedraw(unitRoot, true);
    } else {
      context.requestRedraw(this, completely);
    }
  }

  repaintsAsUnit(): boolean {
    return this.asScrollable() !== null;
  }

  /* --- Measurement & geometry --- */

  measure(painter: Painter): Size {
    return this.renderNode.measure(painter);
  }

  /** Natural size; called through the render node cache. */
  protected measureSelf(_painter: Painter): Size {
    return this.getSize();
  }

  getPos(): Point {
    return this.renderNode.pos;
  }

  getSize(): Size {
    return this.renderNode.size;
  }

  getX(): number {
    return this.renderNode.pos.x;
  }

  getY(): number {
    return this.renderNode.pos.y;
  }

  getWidth(): number {
    return this.renderNode.size.w;
  }

  getHeight(): number {
    return this.renderNode.size.h;
  }

  move(pos: Point): this {
    this.renderNode.setPos(pos);
    return this;
  }

  moveX(x: number): this {
    return this.move(point(x, this.getY()));
  }

  moveY(y: number): this {
    return this.move(point(this.getX(), y));
  }

  resize(s: Size): this {
    this.renderNode.setSize(s);
    return this;
  }

  setWidth(w: number): this {
    return this.resize(size(w, this.getHeight()));
  }

  setHeight(h: number): this {
    return this.resize(size(this.getWidth(), h));
  }

  /* --- Sizing policy --- */

  widthPolicy(policy: SizePolicy): this {
    if (policy !== this.widthPolicyValue) {
      this.widthPolicyValue = policy;
      this.markLayoutDirty();
    }
    return this;
  }

  heightPolicy(policy: SizePolicy): this {
    if (policy !== this.heightPolicyValue) {
      this.heightPolicyValue = policy;
      this.markLayoutDirty();
    }
    return this;
  }

  getWidthPolicy(): SizePolicy {
    return this.widthPolicyValue;
  }

  getHeightPolicy(): SizePolicy {
    return this.heightPolicyValue;
  }

  fixedWidth(w: number): this {
    return this.widthPolicy("fixed").setWidth(w);
  }

  fixedHeight(h: number): this {
    return this.heightPolicy("fixed").setHeight(h);
  }

  fixedSize(w: number, h: number): this {
    return this.fixedWidth(w).fixedHeight(h);
  }

  fitParent(): this {
    return this.widthPolicy("expanding").heightPolicy("expanding");
  }

  fitContent(): this {
    return this.widthPolicy("content").heightPolicy("content");
  }

  fitContentWidth(): this {
    return this.widthPolicy("content");
  }

  fitContentHeight(): this {
    return this.heightPolicy("content");
  }

  flex(weight: number): this {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new LatticeError(
        "LUI_INVALID_SIZE_POLICY",
        `flex must be a finite number >= 0, got ${String(weight)}`,
      );
    }
    if (weight !== this.flexValue) {
      this.flexValue = weight;
      this.parentRef?.markLayoutDirty();
    }
    return this;
  }

  getFlex(): number {
    return this.flexValue;
  }

  zIndex(z: number): this {
    if (!Number.isInteger(z) || z < 1) {
      throw new LatticeError("LUI_INVALID_Z_INDEX", `zIndex must be an integer >= 1, got ${String(z)}`);
    }
    if (z === this.zIndexValue) return this;
    this.zIndexValue = z;
    const parent = this.parentRef;
    if (parent !== null) {
      parent.layoutNode.invalidateZOrder();
      parent.markPaintDirty();
    }
    return this;
  }

  getZIndex(): number {
    return this.zIndexValue;
  }

  tabIndex(index: number): this {
    this.tabIndexValue = index;
    return this;
  }

  getTabIndex(): number {
    return this.tabIndexValue;
  }

  /* --- Hit testing & capabilities --- */

  /** Strict: points on the border are outside. */
  contain(p: Point): boolean {
    return containsStrict(this.getPos(), this.getSize(), p);
  }

  dispatch(p: Point): DispatchResult | null {
    if (!this.contain(p)) return null;
    return Object.freeze({ target: this, pos: subPoints(p, this.getPos()) });
  }

  dispatchToScrollable(_p: Point, _horizontal: boolean): DispatchResult | null {
    return null;
  }

  asScrollable(): Scrollable | null {
    return null;
  }

  asFocusable(): Focusable | null {
    return null;
  }

  /* --- Input hooks --- */

  mouseDown(_ev: MouseEvent): void {}

  mouseUp(_ev: MouseEvent): void {}

  mouseDrag(_ev: MouseEvent): void {}

  mouseOver(): void {}

  mouseOut(): void {}

  mouseWheel(_ev: WheelEvent): void {}

  cursorPos(_ev: MouseEvent): void {}

  inputChar(_ev: InputCharEvent): void {}

  inputKey(_ev: InputKeyEvent): void {}

  focused(): void {}

  unfocused(): void {}

  /* --- Animation helpers --- */

  /** Tween any of x/y/width/height to the given values. */
  animateTo(target: AnimateToTarget, options: WidgetAnimationOptions = {}): readonly Tween[] {
    const current: Record<TweenProperty, number> = {
      x: this.getX(),
      y: this.getY(),
      width: this.getWidth(),
      height: this.getHeight(),
    };
    const steps: Array<[TweenProperty, number]> = [];
    if (target.x !== undefined) steps.push(["x", target.x]);
    if (target.y !== undefined) steps.push(["y", target.y]);
    if (target.width !== undefined) steps.push(["width", target.width]);
    if (target.height !== undefined) steps.push(["height", target.height]);

    const tweens = steps.map(([property, to], i) =>
      this.createTween(property, current[property], to, options, i === steps.length - 1),
    );
    this.startAnimations("animateTo", tweens);
    return tweens;
  }

  /** Jump `distance` away from the current position, then tween back. */
  slideIn(direction: SlideDirection, options: SlideOptions = {}): Tween {
    const { property, end, offset } = this.slideGeometry(direction, options);
    const start = end + offset;
    const tween = this.createTween(property, start, end, options, true);
    this.startAnimations("slideIn", [tween]);
    if (property === "x") this.moveX(start);
    else this.moveY(start);
    return tween;
  }

  /** Tween `distance` away from the current position. */
  slideOut(direction: SlideDirection, options: SlideOptions = {}): Tween {
    const { property, end, offset } = this.slideGeometry(direction, options);
    const tween = this.createTween(property, end, end + offset, options, true);
    this.startAnimations("slideOut", [tween]);
    return tween;
  }

  private slideGeometry(
    direction: SlideDirection,
    options: SlideOptions,
  ): Readonly<{ property: "x" | "y"; end: number; offset: number }> {
    const horizontal = direction === "left" || direction === "right";
    const distance = options.distance ?? (horizontal ? this.getWidth() : this.getHeight());
    const sign = direction === "left" || direction === "top" ? -1 : 1;
    return {
      property: horizontal ? "x" : "y",
      end: horizontal ? this.getX() : this.getY(),
      offset: sign * distance,
    };
  }

  private createTween(
    property: TweenProperty,
    from: number,
    to: number,
    options: WidgetAnimationOptions,
    withCompletion: boolean,
  ): Tween {
    return new Tween(
      { widget: this, property },
      {
        from,
        to,
        ...(options.durationMs !== undefined ? { durationMs: options.durationMs } : {}),
        ...(options.easing !== undefined ? { easing: options.easing } : {}),
        ...(withCompletion && options.onComplete !== undefined
          ? { onComplete: options.onComplete }
          : {}),
      },
    );
  }

  private startAnimations(operation: string, animations: readonly Animation[]): void {
    const context = this.context;
    if (context === null) {
      throw new LatticeError(
        "LUI_DETACHED_WIDGET",
        `${operation}: widget #${String(this.id)} is not attached to an app`,
      );
    }
    for (const animation of animations) {
      context.scheduler.add(animation);
    }
  }
}
