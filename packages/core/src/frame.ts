/**
 * Frame contract: the platform window/terminal that feeds input to the App and
 * hosts the update queue.
 *
 * `postUpdate` may be called from animation callbacks at any time. The frame
 * queues events and hands them to the `onUpdate` handler in one batch before its
 * next repaint; handlers never run re-entrantly from inside `postUpdate`.
 */

import type {
  InputCharEvent,
  InputKeyEvent,
  MouseEvent,
  WheelEvent,
} from "./events.js";
import type { Size } from "./layout/types.js";
import type { Painter } from "./painter.js";
import type { Widget } from "./widgets/widget.js";

/**
 * Work posted to the UI thread.
 *
 * - `redraw`: repaint `target` (or the whole tree when `target` is null).
 * - `apply`: run a state mutation (animation value writes) before repainting.
 */
export type UpdateEvent =
  | Readonly<{ kind: "redraw"; target: Widget | null; completely: boolean }>
  | Readonly<{ kind: "apply"; run: () => void }>;

export type RedrawHandler = (painter: Painter, completely: boolean) => void;

export type UpdateHandler = (batch: readonly UpdateEvent[], painter: Painter) => void;

export interface Frame {
  onMouseDown(handler: (ev: MouseEvent) => void): void;
  onMouseUp(handler: (ev: MouseEvent) => void): void;
  onMouseWheel(handler: (ev: WheelEvent) => void): void;
  onCursorPos(handler: (ev: MouseEvent) => void): void;
  onInputChar(handler: (ev: InputCharEvent) => void): void;
  onInputKey(handler: (ev: InputKeyEvent) => void): void;
  onRedraw(handler: RedrawHandler): void;
  onUpdate(handler: UpdateHandler): void;

  getPainter(): Painter;
  getSize(): Size;

  postUpdate(ev: UpdateEvent): void;

  /** Resolves when the frame closes. */
  run(): Promise<void>;
}
