import { AnimationScheduler } from "../../animation/scheduler.js";
import { createDevWarnings } from "../../debug/devWarnings.js";
import { BuildOwner } from "../../runtime/buildOwner.js";
import type { UiContext } from "../../runtime/context.js";
import { createWidgetArena } from "../../runtime/widgetArena.js";
import { createManualClock } from "../../testing/manualClock.js";
import type { Widget } from "../widget.js";

export type RedrawRequest = Readonly<{ target: Widget | null; completely: boolean }>;

export type TestContext = Readonly<{
  context: UiContext;
  redraws: RedrawRequest[];
  warnings: string[];
}>;

/** Context with a parked scheduler that records redraw requests instead of painting. */
export function createTestContext(): TestContext {
  const redraws: RedrawRequest[] = [];
  const warnings: string[] = [];
  const devWarnings = createDevWarnings({ devMode: true, warn: (m) => warnings.push(m) });
  const context: UiContext = Object.freeze({
    buildOwner: new BuildOwner(),
    scheduler: new AnimationScheduler({ clock: createManualClock(), warnings: devWarnings }),
    arena: createWidgetArena<Widget>(),
    warnings: devWarnings,
    requestRedraw: (target: Widget | null, completely: boolean) => {
      redraws.push({ target, completely });
    },
  });
  return { context, redraws, warnings };
}
