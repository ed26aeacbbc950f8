/**
 * packages/core/src/runtime/widgetArena.ts — Generational widget handles.
 *
 * Why: The App remembers the hovered, focused and pressed widgets across events.
 * Holding those as `{ id, generation }` handles instead of references means a
 * widget that was detached in between (a component rebuild, a removed row)
 * resolves to null and never receives a stale callback.
 *
 * A widget bumps its generation on every detach, so a handle taken before the
 * detach stops resolving even if the same object is later re-attached.
 */

export type WidgetHandle = Readonly<{ id: number; generation: number }>;

/** What the arena needs from a widget. */
export interface ArenaMember {
  readonly id: number;
  getGeneration(): number;
  isMounted(): boolean;
}

export type WidgetArena<W extends ArenaMember> = Readonly<{
  /** Register (or refresh) a widget and return a handle to its current generation. */
  track: (widget: W) => WidgetHandle;
  /** Live widget for a handle, or null when it was detached or unmounted since. */
  resolve: (handle: WidgetHandle | null) => W | null;
  size: () => number;
}>;

export function createWidgetArena<W extends ArenaMember>(): WidgetArena<W> {
  const slots = new Map<number, W>();

  const isLive = (widget: W, handle: WidgetHandle): boolean =>
    widget.getGeneration() === handle.generation && widget.isMounted();

  return Object.freeze({
    track(widget: W): WidgetHandle {
      slots.set(widget.id, widget);
      return Object.freeze({ id: widget.id, generation: widget.getGeneration() });
    },

    resolve(handle: WidgetHandle | null): W | null {
      if (handle === null) return null;
      const widget = slots.get(handle.id);
      if (widget === undefined) return null;
      if (isLive(widget, handle)) return widget;
      // A detached, unmounted widget can only come back through a fresh track().
      if (widget.getGeneration() !== handle.generation && !widget.isMounted()) {
        slots.delete(handle.id);
      }
      return null;
    },

    size(): number {
      return slots.size;
    },
  });
}
