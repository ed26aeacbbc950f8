/**
 * packages/core/src/app/createApp.ts — App runtime (dispatcher + frame driver).
 *
 * Why: The App owns the root widget and turns frame callbacks into widget
 * calls. Hovered/pressed/focused widgets are held as generational handles, so
 * a rebuild that detaches one of them never leads to a callback on a dead
 * widget.
 *
 * Every input handler and every update batch runs inside one build scope:
 * component rebuilds triggered by state writes are coalesced and flushed when
 * the handler returns.
 *
 * Coordinates: frames report window positions; hooks receive positions local
 * to the target widget. While a button is held, positions are tracked as
 * deltas from the press so a drag keeps working after leaving the widget.
 */

import { AnimationScheduler } from "../animation/scheduler.js";
import { createDevWarnings } from "../debug/devWarnings.js";
import { describeThrown } from "../errors.js";
import type { InputCharEvent, InputKeyEvent, MouseEvent, WheelEvent } from "../events.js";
import type { UpdateEvent } from "../frame.js";
import { addPoints, rect, size, subPoints } from "../layout/geometry.js";
import { type Point, ZERO_POINT } from "../layout/types.js";
import type { Painter } from "../painter.js";
import { BuildOwner } from "../runtime/buildOwner.js";
import type { UiContext } from "../runtime/context.js";
import { FocusManager } from "../runtime/focus.js";
import { type WidgetHandle, createWidgetArena } from "../runtime/widgetArena.js";
import type { Widget } from "../widgets/widget.js";
import { effectiveFps, resolveAppConfig } from "./config.js";
import type { App, CreateAppOptions } from "./types.js";

export function createApp(opts: CreateAppOptions): App {
  const { frame, root } = opts;
  const config = resolveAppConfig(opts.config);
  const warnings = createDevWarnings({ devMode: config.devMode, warn: config.warn });
  const buildOwner = new BuildOwner();
  const arena = createWidgetArena<Widget>();
  const focus = new FocusManager(arena);

  /* While a batch is being applied, redraw requests join that batch. */
  let currentBatch: UpdateEvent[] | null = null;
  const post = (ev: UpdateEvent): void => {
    if (currentBatch !== null) {
      currentBatch.push(ev);
    } else {
      frame.postUpdate(ev);
    }
  };

  const scheduler = new AnimationScheduler({
    fps: effectiveFps(config),
    host: { post: (run) => frame.postUpdate({ kind: "apply", run }) },
    warnings,
    ...(opts.clock !== undefined ? { clock: opts.clock } : {}),
  });

  const context: UiContext = Object.freeze({
    buildOwner,
    scheduler,
    arena,
    warnings,
    requestRedraw: (target: Widget | null, completely: boolean) => {
      post({ kind: "redraw", target, completely });
    },
  });

  let hoveredHandle: WidgetHandle | null = null;
  let pressedHandle: WidgetHandle | null = null;
  let lastAbsPos: Point = ZERO_POINT;
  let lastRelPos: Point = ZERO_POINT;
  let disposed = false;

  /* --- Painting --- */

  const relocateRoot = (): void => {
    const frameSize = frame.getSize();
    root.move(ZERO_POINT);
    root.resize(
      size(
        root.getWidthPolicy() === "expanding" ? frameSize.w : root.getWidth(),
        root.getHeightPolicy() === "expanding" ? frameSize.h : root.getHeight(),
      ),
    );
  };

  const redraw = (painter: Painter, completely: boolean): void => {
    if (focus.currentScope() === null) focus.collectFocusables(root);
    relocateRoot();
    if (completely || root.isDirty()) {
      painter.clearAll();
      painter.save();
      try {
        painter.translate(root.getPos());
        painter.clip(rect(0, 0, root.getWidth(), root.getHeight()));
        root.redraw(painter, completely);
      } finally {
        painter.restore();
      }
      root.setDirty(false);
    }
    painter.flush();
  };

  const redrawTarget = (painter: Painter, target: Widget, completely: boolean): void => {
    painter.save();
    try {
      painter.translate(target.getPos());
      painter.clip(rect(0, 0, target.getWidth(), target.getHeight()));
      target.redraw(painter, completely);
    } finally {
      painter.restore();
    }
    target.setDirty(false);
  };

  const processUpdates = (batch: readonly UpdateEvent[], painter: Painter): void => {
    const queue = batch.slice();
    currentBatch = queue;
    try {
      buildOwner.buildScope(() => {
        for (let i = 0; i < queue.length; i++) {
          const ev = queue[i];
          if (ev === undefined || ev.kind !== "apply") continue;
          try {
            ev.run();
          } catch (error) {
            warnings.warn("app", `posted update failed: ${describeThrown(error)}`);
          }
        }
      });
    } finally {
      currentBatch = null;
    }

    let whole = false;
    const targets = new Map<Widget, boolean>();
    for (const ev of queue) {
      if (ev.kind !== "redraw") continue;
      if (ev.target === null) {
        whole = true;
      } else {
        targets.set(ev.target, (targets.get(ev.target) ?? false) || ev.completely);
      }
    }

    if (whole) {
      redraw(painter, true);
      return;
    }
    if (targets.size === 0) return;
    for (const [target, completely] of targets) {
      if (!target.isMounted() || target.context !== context) {
        warnings.warnOnce(
          `redraw-detached:${String(target.id)}`,
          "app",
          `redraw dropped for detached widget #${String(target.id)}`,
        );
        continue;
      }
      redrawTarget(painter, target, completely);
    }
    painter.flush();
  };

  /* --- Input --- */

  const withLocalPos = <E extends MouseEvent | WheelEvent>(ev: E, pos: Point): E => ({
    ...ev,
    pos,
  });

  const trackDrag = (absPos: Point): Point => {
    const pos = addPoints(lastRelPos, subPoints(absPos, lastAbsPos));
    lastAbsPos = absPos;
    lastRelPos = pos;
    return pos;
  };

  const onMouseDown = (ev: MouseEvent): void => {
    buildOwner.buildScope(() => {
      const hit = root.dispatch(ev.pos);
      if (hit === null) return;
      pressedHandle = arena.track(hit.target);
      lastAbsPos = ev.pos;
      lastRelPos = hit.pos;
      hit.target.mouseDown(withLocalPos(ev, hit.pos));
    });
  };

  const onMouseUp = (ev: MouseEvent): void => {
    buildOwner.buildScope(() => {
      const handle = pressedHandle;
      try {
        const pressed = arena.resolve(handle);
        if (pressed === null) return;
        const hit = root.dispatch(ev.pos);
        let pos: Point;
        if (hit !== null && hit.target === pressed) {
          pos = hit.pos;
          lastAbsPos = ev.pos;
          lastRelPos = pos;
        } else {
          // Released outside the pressed widget: continue from the drag delta.
          pos = trackDrag(ev.pos);
        }
        pressed.mouseUp(withLocalPos(ev, pos));
        if (arena.resolve(handle) !== null) focus.setFocus(pressed);
      } finally {
        pressedHandle = null;
      }
    });
  };

  const onCursorPos = (ev: MouseEvent): void => {
    buildOwner.buildScope(() => {
      if (pressedHandle !== null) {
        const pressed = arena.resolve(pressedHandle);
        if (pressed !== null) {
          pressed.mouseDrag(withLocalPos(ev, trackDrag(ev.pos)));
          return;
        }
        pressedHandle = null;
      }

      const previous = arena.resolve(hoveredHandle);
      const hit = root.dispatch(ev.pos);
      if (hit === null) {
        previous?.mouseOut();
        hoveredHandle = null;
        return;
      }
      if (previous !== hit.target) {
        previous?.mouseOut();
        hoveredHandle = arena.track(hit.target);
        hit.target.mouseOver();
      }
      hit.target.cursorPos(withLocalPos(ev, hit.pos));
    });
  };

  const onMouseWheel = (ev: WheelEvent): void => {
    buildOwner.buildScope(() => {
      const hit = root.dispatchToScrollable(ev.pos, Math.abs(ev.dx) > Math.abs(ev.dy));
      if (hit === null) return;
      hit.target.mouseWheel(withLocalPos(ev, hit.pos));
    });
  };

  const onInputChar = (ev: InputCharEvent): void => {
    buildOwner.buildScope(() => {
      focus.focus()?.inputChar(ev);
    });
  };

  const onInputKey = (ev: InputKeyEvent): void => {
    buildOwner.buildScope(() => {
      if (focus.handleKeyEvent(ev)) return;
      focus.focus()?.inputKey(ev);
    });
  };

  /* --- Wiring --- */

  root.attachContext(context);
  root.mount(null);

  frame.onMouseDown(onMouseDown);
  frame.onMouseUp(onMouseUp);
  frame.onCursorPos(onCursorPos);
  frame.onMouseWheel(onMouseWheel);
  frame.onInputChar(onInputChar);
  frame.onInputKey(onInputKey);
  frame.onRedraw(redraw);
  frame.onUpdate(processUpdates);

  const dispose = (): void => {
    if (disposed) return;
    disposed = true;
    scheduler.stop();
    scheduler.clear();
  };

  return Object.freeze({
    root,
    config,
    context,
    scheduler,
    focus,
    hovered: () => arena.resolve(hoveredHandle),
    pressed: () => arena.resolve(pressedHandle),
    focused: () => focus.focus(),
    redraw,
    processUpdates,
    run: async (): Promise<void> => {
      try {
        await frame.run();
      } finally {
        dispose();
      }
    },
    dispose,
  });
}
