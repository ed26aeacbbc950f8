import type { AnimationScheduler, SchedulerClock } from "../animation/scheduler.js";
import type { WarnSink } from "../debug/devWarnings.js";
import type { Frame, UpdateEvent } from "../frame.js";
import type { Painter } from "../painter.js";
import type { UiContext } from "../runtime/context.js";
import type { FocusManager } from "../runtime/focus.js";
import type { Widget } from "../widgets/widget.js";

export type AppConfig = Readonly<{
  /** Animation ticks per second. */
  fpsCap?: number;
  /** Tick rate used instead of `fpsCap` on low-refresh hosts. */
  lowRefreshFpsCap?: number;
  /** Defaults to the LATTICE_LOW_REFRESH environment variable. */
  lowRefresh?: boolean;
  /** Defaults to `NODE_ENV !== "production"`. */
  devMode?: boolean;
  warn?: WarnSink;
}>;

export type ResolvedAppConfig = Readonly<{
  fpsCap: number;
  lowRefreshFpsCap: number;
  lowRefresh: boolean;
  devMode: boolean;
  warn: WarnSink;
}>;

export type CreateAppOptions = Readonly<{
  frame: Frame;
  root: Widget;
  config?: AppConfig;
  /** Clock for the animation loop. Tests pass a manual clock. */
  clock?: SchedulerClock;
}>;

export interface App {
  readonly root: Widget;
  readonly config: ResolvedAppConfig;
  readonly context: UiContext;
  readonly scheduler: AnimationScheduler;
  readonly focus: FocusManager;

  hovered(): Widget | null;
  pressed(): Widget | null;
  focused(): Widget | null;

  /** Lay out and paint the tree. Paints only when `completely` or the root is dirty. */
  redraw(painter: Painter, completely: boolean): void;
  /** Apply posted state writes, then repaint what they and earlier requests touched. */
  processUpdates(batch: readonly UpdateEvent[], painter: Painter): void;

  /** Resolves when the frame closes; the App is disposed afterwards. */
  run(): Promise<void>;
  dispose(): void;
}
