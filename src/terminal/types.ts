/**
 * Terminal Drawing Types
 *
 * Geometry, styled text and the widget capability shared by everything
 * that draws into a CellBuffer.
 */

import type { CellBuffer } from "./buffer.js";

/** Named terminal colors supported by the ANSI writer */
export const COLOR_NAMES = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white", "gray"] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

/** Cell style. Undefined attributes inherit from whatever is underneath. */
export interface Style {
  fg?: ColorName;
  bg?: ColorName;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  inverse?: boolean;
}

/** A run of text drawn with one style */
export interface Span {
  content: string;
  style: Style;
}

/** One terminal row of styled spans */
export type DisplayLine = Span[];

/** Rectangle in character cells, origin at the top-left corner */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Exclusive bottom edge of a rectangle */
export function rectBottom(rect: Rect): number {
  return rect.y + rect.height;
}

/** Exclusive right edge of a rectangle */
export function rectRight(rect: Rect): number {
  return rect.x + rect.width;
}

/**
 * Capability of anything that draws into a buffer region while reading
 * and updating caller-owned state (scroll position, selection) across
 * frames.
 */
export interface StatefulWidget<S> {
  render(area: Rect, buffer: CellBuffer, state: S): void;
}
