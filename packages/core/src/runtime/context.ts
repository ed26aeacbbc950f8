/**
 * packages/core/src/runtime/context.ts — Services shared by every widget of one App.
 *
 * Why: The build owner, animation scheduler and handle arena are per-App
 * instances injected at the root and found by walking up the parent chain, so
 * several Apps (or tests) never share hidden global state.
 */

import type { AnimationScheduler } from "../animation/scheduler.js";
import type { DevWarnings } from "../debug/devWarnings.js";
import type { Widget } from "../widgets/widget.js";
import type { BuildOwner } from "./buildOwner.js";
import type { WidgetArena } from "./widgetArena.js";

export type UiContext = Readonly<{
  buildOwner: BuildOwner;
  scheduler: AnimationScheduler;
  arena: WidgetArena<Widget>;
  warnings: DevWarnings;
  /** Queue a repaint of `target` (null: the whole tree). */
  requestRedraw: (target: Widget | null, completely: boolean) => void;
}>;
