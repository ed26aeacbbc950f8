/**
 * packages/core/src/widgets/component.ts — Widgets whose content is rebuilt from state.
 *
 * Why: A component describes its subtree with `view()`. When observed state
 * changes the old subtree is thrown away (detached, so stale handles stop
 * resolving) and `view()` runs again on the next measure or paint. Widgets
 * produced through `cache()` survive the rebuild and are re-parented into the
 * new subtree.
 */

import { LatticeError } from "../errors.js";
import type { Size } from "../layout/types.js";
import type { Painter } from "../painter.js";
import type { Buildable } from "../runtime/buildOwner.js";
import type { Observable } from "../state/observable.js";
import { Layout } from "./layout.js";
import type { Widget } from "./widget.js";

export type CacheKeyOf<T> = (item: T) => unknown;

/** `item.id` when the item has one, otherwise the item itself. */
export function defaultCacheKey(item: unknown): unknown {
  if (typeof item === "object" && item !== null && "id" in item) return item.id;
  return item;
}

export abstract class Component extends Layout implements Buildable {
  private viewRoot: Widget | null = null;
  private rebuildPending = true;
  private readonly caches = new Map<string, Map<unknown, Widget>>();

  /** Describe the subtree for the current state. */
  protected abstract view(): Widget;

  /** The current view, or null before the first measure/paint. */
  getView(): Widget | null {
    return this.viewRoot;
  }

  isRebuildPending(): boolean {
    return this.rebuildPending;
  }

  private ensureView(): Widget {
    if (this.viewRoot !== null && !this.rebuildPending) return this.viewRoot;
    const previous = this.viewRoot;
    if (previous !== null) {
      this.remove(previous);
      previous.detach();
    }
    this.rebuildPending = false;
    const next = this.view();
    this.viewRoot = next;
    this.add(next);
    return next;
  }

  override onNotify(): void {
    const owner = this.context?.buildOwner;
    if (owner !== undefined && owner.isInBuildScope()) {
      owner.scheduleBuildFor(this);
    } else {
      this.performRebuild();
    }
  }

  performRebuild(): void {
    this.rebuildPending = true;
    this.markLayoutDirty();
    this.context?.requestRedraw(null, true);
  }

  protected override measureSelf(painter: Painter): Size {
    return this.ensureView().measure(painter);
  }

  protected override relocateChildren(_painter: Painter): void {
    const child = this.ensureView();
    child.resize(this.getSize());
    child.move(this.getPos());
  }

  override redraw(painter: Painter, completely: boolean): void {
    const rebuilt = this.rebuildPending;
    this.ensureView();
    super.redraw(painter, completely || rebuilt);
  }

  /**
   * Widgets for `items`, reused per key across rebuilds. Widgets whose key
   * disappeared are un-cached and detached.
   */
  protected cache<T>(
    cacheId: string,
    items: Iterable<T>,
    factory: (item: T) => Widget,
    keyOf: CacheKeyOf<T> = defaultCacheKey,
  ): Widget[] {
    const previous = this.caches.get(cacheId) ?? new Map<unknown, Widget>();
    const next = new Map<unknown, Widget>();
    const out: Widget[] = [];
    for (const item of items) {
      const key = keyOf(item);
      if (next.has(key)) {
        throw new LatticeError(
          "LUI_INVALID_STATE",
          `cache "${cacheId}": duplicate key ${String(key)}`,
        );
      }
      let widget = previous.get(key);
      if (widget === undefined) {
        widget = factory(item);
        widget.setCached(true);
      }
      next.set(key, widget);
      out.push(widget);
    }
    for (const [key, widget] of previous) {
      if (!next.has(key)) this.evict(widget);
    }
    this.caches.set(cacheId, next);
    return out;
  }

  private evict(widget: Widget): void {
    widget.setCached(false);
    widget.parent?.remove(widget);
    widget.detach();
  }

  override detach(): void {
    if (this.isCached()) return;
    const cachedWidgets: Widget[] = [];
    for (const entries of this.caches.values()) {
      for (const widget of entries.values()) {
        widget.setCached(false);
        cachedWidgets.push(widget);
      }
    }
    this.caches.clear();
    super.detach();
    for (const widget of cachedWidgets) {
      if (widget.isMounted()) widget.detach();
    }
  }
}

/**
 * Component bound to one or more states: any notification rebuilds it, and its
 * repaints cover the whole component.
 */
export abstract class StatefulComponent extends Component {
  constructor(...states: Observable[]) {
    super();
    for (const state of states) state.attach(this);
  }

  override repaintsAsUnit(): boolean {
    return true;
  }
}
