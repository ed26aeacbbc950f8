/**
 * packages/core/src/widgets/scrollbar.ts — Scrollbar geometry shared by scrollable layouts.
 */

import type { Color } from "../painter.js";

/** Thickness of a scrollbar gutter. */
export const SCROLL_BAR_SIZE = 10;

export const SCROLLBAR_TRACK_COLOR: Color = "#2b2b2b";
export const SCROLLBAR_THUMB_COLOR: Color = "#8a8a8a";

export type ThumbSpan = Readonly<{ start: number; length: number }>;

export function clampOffset(value: number, max: number): number {
  return Math.min(Math.max(0, max), Math.max(0, value));
}

/** Thumb position and length along a track as long as `viewport`. */
export function thumbSpan(offset: number, viewport: number, content: number): ThumbSpan {
  const total = Math.max(content, 1);
  return {
    start: (offset * viewport) / total,
    length: Math.max(SCROLL_BAR_SIZE, (viewport * viewport) / total),
  };
}

/** Scroll distance for a thumb moved by `delta` along its track. */
export function thumbDragDistance(delta: number, viewport: number, content: number): number {
  return (delta * content) / Math.max(viewport, 1);
}
