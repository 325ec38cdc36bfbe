/**
 * Style Helpers
 *
 * Layering of cell styles and conversion of styled text to ANSI
 * escape sequences via picocolors.
 */

import pc from "picocolors";
import { COLOR_NAMES, type ColorName, type Style } from "./types.js";

type Colors = ReturnType<typeof pc.createColors>;
type Formatter = (input: string) => string;

/** The empty style: every attribute inherits */
export const EMPTY_STYLE: Style = Object.freeze({});

/**
 * Overlay every attribute defined in `top` onto `base`.
 * Neither argument is mutated.
 */
export function patchStyle(base: Style, top: Style): Style {
  const result: Style = { ...base };
  if (top.fg !== undefined) result.fg = top.fg;
  if (top.bg !== undefined) result.bg = top.bg;
  if (top.bold !== undefined) result.bold = top.bold;
  if (top.dim !== undefined) result.dim = top.dim;
  if (top.italic !== undefined) result.italic = top.italic;
  if (top.underline !== undefined) result.underline = top.underline;
  if (top.inverse !== undefined) result.inverse = top.inverse;
  return result;
}

/**
 * Structural equality over the attributes that affect output.
 */
export function styleEquals(a: Style, b: Style): boolean {
  return (
    a.fg === b.fg &&
    a.bg === b.bg &&
    Boolean(a.bold) === Boolean(b.bold) &&
    Boolean(a.dim) === Boolean(b.dim) &&
    Boolean(a.italic) === Boolean(b.italic) &&
    Boolean(a.underline) === Boolean(b.underline) &&
    Boolean(a.inverse) === Boolean(b.inverse)
  );
}

/**
 * Narrow an arbitrary string (settings file, env var) to a color name.
 */
export function parseColorName(value: string | undefined): ColorName | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return COLOR_NAMES.find((name) => name === normalized);
}

function foreground(colors: Colors, color: ColorName): Formatter {
  switch (color) {
    case "black":
      return colors.black;
    case "red":
      return colors.red;
    case "green":
      return colors.green;
    case "yellow":
      return colors.yellow;
    case "blue":
      return colors.blue;
    case "magenta":
      return colors.magenta;
    case "cyan":
      return colors.cyan;
    case "white":
      return colors.white;
    case "gray":
      return colors.gray;
  }
}

function background(colors: Colors, color: ColorName): Formatter {
  switch (color) {
    case "black":
      return colors.bgBlack;
    case "red":
      return colors.bgRed;
    case "green":
      return colors.bgGreen;
    case "yellow":
      return colors.bgYellow;
    case "blue":
      return colors.bgBlue;
    case "magenta":
      return colors.bgMagenta;
    case "cyan":
      return colors.bgCyan;
    case "white":
      return colors.bgWhite;
    case "gray":
      // No bright background in the basic palette
      return colors.bgBlack;
  }
}

/**
 * Wrap text in the escape sequences for a style.
 * With `enabled = false` the text is returned unchanged.
 */
export function styleText(text: string, style: Style, enabled = true): string {
  if (!enabled || text.length === 0) {
    return text;
  }

  const colors = pc.createColors(true);
  let out = text;
  if (style.fg !== undefined) out = foreground(colors, style.fg)(out);
  if (style.bg !== undefined) out = background(colors, style.bg)(out);
  if (style.bold) out = colors.bold(out);
  if (style.dim) out = colors.dim(out);
  if (style.italic) out = colors.italic(out);
  if (style.underline) out = colors.underline(out);
  if (style.inverse) out = colors.inverse(out);
  return out;
}
