/**
 * packages/core/src/events.ts — Input event types delivered by a Frame.
 *
 * Positions arrive in window coordinates; the App rewrites `pos` to the target
 * widget's local coordinates before calling a widget hook.
 */

import type { Point } from "./layout/types.js";

export type MouseButton = "left" | "middle" | "right";

export type MouseEvent = Readonly<{
  pos: Point;
  button?: MouseButton;
}>;

/** Wheel deltas in pixels; positive `dy` scrolls content up (towards the end). */
export type WheelEvent = Readonly<{
  pos: Point;
  dx: number;
  dy: number;
}>;

export type InputCharEvent = Readonly<{
  char: string;
}>;

export type KeyCode =
  | "tab"
  | "enter"
  | "escape"
  | "backspace"
  | "delete"
  | "left"
  | "right"
  | "up"
  | "down"
  | "home"
  | "end"
  | "pageUp"
  | "pageDown"
  | "space"
  | "unknown";

export type KeyAction = "press" | "release" | "repeat";

export type KeyModifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

export const NO_MODIFIERS: KeyModifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export type InputKeyEvent = Readonly<{
  key: KeyCode;
  action: KeyAction;
  mods: KeyModifiers;
}>;
