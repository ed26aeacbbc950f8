/**
 * Painter contract consumed by widgets.
 *
 * Widgets paint in local coordinates: when `redraw` is called the painter has
 * already been translated to the widget's origin and clipped to its size.
 */

import type { Circle, Point, Rect } from "./layout/types.js";

export type Color = string;

export type FillStyle = Readonly<{ color: Color }>;

export type StrokeStyle = Readonly<{ color: Color; width?: number }>;

export type Font = Readonly<{
  family?: string;
  size: number;
  weight?: "normal" | "bold";
}>;

export type Style = Readonly<{
  fill?: FillStyle;
  stroke?: StrokeStyle;
  font?: Font;
  borderRadius?: number;
}>;

export type FontMetrics = Readonly<{
  ascent: number;
  descent: number;
  lineHeight: number;
}>;

/**
 * Low-level drawing surface implemented by a platform host.
 *
 * All coordinates are relative to the current translation.
 */
export interface Painter {
  /**
   * Clear the whole surface to a color, ignoring translation and clip.
   */
  clearAll(color?: Color): void;

  /**
   * Fill a rectangle with the current style's fill color.
   */
  fillRect(rect: Rect): void;

  /**
   * Stroke a rectangle outline with the current style's stroke.
   */
  strokeRect(rect: Rect): void;

  fillCircle(circle: Circle): void;

  strokeCircle(circle: Circle): void;

  /**
   * Move the origin by an offset. Accumulates until the matching restore().
   */
  translate(offset: Point): void;

  /**
   * Intersect the current clip with a rectangle (in translated coordinates).
   */
  clip(rect: Rect): void;

  /**
   * Push translation, clip and style. Every save() must be paired with restore().
   */
  save(): void;

  restore(): void;

  /**
   * Draw text with its baseline at `pos`. Text longer than `maxWidth` is cut.
   */
  fillText(text: string, pos: Point, maxWidth?: number): void;

  /**
   * Advance width of `text` in the current font.
   */
  measureText(text: string): number;

  fontMetrics(): FontMetrics;

  /**
   * Replace the current style.
   */
  style(style: Style): void;

  /**
   * Present everything drawn since the previous flush.
   */
  flush(): void;
}
