/**
 * logpane public API
 */

export * from "./widgets/log-list/index.js";
export { CellBuffer } from "./terminal/buffer.js";
export type { Cell, AnsiOptions } from "./terminal/buffer.js";
export { patchStyle, styleEquals, styleText, parseColorName, EMPTY_STYLE } from "./terminal/style.js";
export { COLOR_NAMES, rectBottom, rectRight } from "./terminal/types.js";
export type { ColorName, Style, Span, DisplayLine, Rect, StatefulWidget } from "./terminal/types.js";
export { keyEvent, ctrlKey, fromInkInput, NO_MODIFIERS } from "./terminal/keys.js";
export type { KeyEvent, KeyCode, KeyModifiers, NamedKey } from "./terminal/keys.js";
export { sanitizeText } from "./terminal/text.js";
export { createModel, createItem, readLogFile, splitLines, detectLevel } from "./sources/file-source.js";
export { DEFAULTS, buildListOptions, getHighlightColor, getMatchColor, getLogLevel } from "./settings/defaults.js";
export type { ViewerSettings, LogLevel } from "./settings/types.js";
