/**
 * Log List Item
 *
 * One log entry: its text and the style it is drawn with.
 */

import { EMPTY_STYLE } from "../../terminal/style.js";
import type { DisplayLine, Style } from "../../terminal/types.js";
import { composeLines, measureHeight, type ComposeStyles } from "./line-composer.js";

export class LogListItem {
  readonly content: string;
  readonly style: Style;

  constructor(content: string, style: Style = EMPTY_STYLE) {
    this.content = content;
    this.style = style;
  }

  /** Same content with a different style */
  withStyle(style: Style): LogListItem {
    return new LogListItem(this.content, style);
  }

  /**
   * Rows this item occupies at the given width. Recomputed on every call
   * because the width can change between frames.
   */
  height(width: number): number {
    return measureHeight(this.content, width);
  }

  lines(width: number, query: string, styles?: ComposeStyles): DisplayLine[] {
    return composeLines(this.content, width, query, styles);
  }
}
