/**
 * Log List Widget
 *
 * Draws the visible window of log items into a cell buffer, wrapping each
 * item to the area width and highlighting the selection and search
 * matches.
 */

import type { CellBuffer } from "../../terminal/buffer.js";
import { EMPTY_STYLE, patchStyle } from "../../terminal/style.js";
import { rectBottom, type Rect, type StatefulWidget, type Style } from "../../terminal/types.js";
import type { LogListItem } from "./item.js";
import { DEFAULT_MATCH_STYLE } from "./line-composer.js";
import type { LogListState } from "./state.js";
import { computeWindow } from "./window.js";

export interface LogListOptions {
  /** Base style of the whole list area */
  readonly style: Style;
  /** Layered over the selected item */
  readonly highlightStyle: Style;
  /** Layered over search matches */
  readonly matchStyle: Style;
}

export const DEFAULT_LOG_LIST_OPTIONS: LogListOptions = Object.freeze({
  style: EMPTY_STYLE,
  highlightStyle: Object.freeze({ inverse: true }),
  matchStyle: DEFAULT_MATCH_STYLE,
});

export class LogList implements StatefulWidget<LogListState> {
  private readonly items: readonly LogListItem[];
  private readonly options: LogListOptions;

  constructor(items: readonly LogListItem[], options: Partial<LogListOptions> = {}) {
    this.items = items;
    this.options = { ...DEFAULT_LOG_LIST_OPTIONS, ...options };
  }

  render(area: Rect, buffer: CellBuffer, state: LogListState): void {
    if (area.width < 1 || area.height < 1 || this.items.length === 0) {
      return;
    }

    const { style, highlightStyle, matchStyle } = this.options;
    const heightOf = (index: number): number => this.items[index]?.height(area.width) ?? 0;

    const { start, end } = computeWindow({
      count: this.items.length,
      heightOf,
      offset: state.offset,
      selected: state.selected(),
      listHeight: area.height,
    });
    state.offset = start;

    buffer.setStyle(area, style);

    const bottom = rectBottom(area);
    let row = area.y;

    for (let index = start; index < end; index++) {
      const item = this.items[index];
      if (!item) break;
      if (row >= bottom) break;

      const itemHeight = item.height(area.width);
      const itemArea: Rect = {
        x: area.x,
        y: row,
        width: area.width,
        height: Math.min(itemHeight, bottom - row),
      };

      let itemStyle = patchStyle(style, item.style);
      buffer.setStyle(itemArea, itemStyle);
      if (state.selected() === index) {
        buffer.setStyle(itemArea, highlightStyle);
        itemStyle = patchStyle(itemStyle, highlightStyle);
      }

      const lines = item.lines(area.width, state.query, { base: itemStyle, match: matchStyle });
      lines.forEach((line, lineIndex) => {
        if (row + lineIndex < bottom) {
          buffer.setSpans(area.x, row + lineIndex, line, area.width);
        }
      });

      row += itemHeight;
    }
  }
}
