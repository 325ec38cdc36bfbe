/**
 * Cell Buffer
 *
 * Fixed-size grid of styled character cells. Widgets draw into it and the
 * host turns it into printable lines once per frame.
 */

import { EMPTY_STYLE, patchStyle, styleEquals, styleText } from "./style.js";
import { isControlSymbol } from "./text.js";
import { rectBottom, rectRight, type Rect, type Span, type Style } from "./types.js";

export interface Cell {
  symbol: string;
  style: Style;
}

export interface AnsiOptions {
  /** Emit plain text without escape sequences */
  noColor?: boolean;
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export class CellBuffer {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[];

  constructor(width: number, height: number) {
    assertDimension("width", width);
    assertDimension("height", height);
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: width * height }, () => ({ symbol: " ", style: EMPTY_STYLE }));
  }

  /** The whole buffer as a rectangle */
  get area(): Rect {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  /**
   * Cell at (x, y), or undefined outside the buffer.
   */
  get(x: number, y: number): Cell | undefined {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return undefined;
    }
    return this.cells[y * this.width + x];
  }

  /**
   * Layer a style over every cell of a rectangle. Parts of the rectangle
   * outside the buffer are ignored.
   */
  setStyle(rect: Rect, style: Style): void {
    const left = Math.max(0, rect.x);
    const top = Math.max(0, rect.y);
    const right = Math.min(this.width, rectRight(rect));
    const bottom = Math.min(this.height, rectBottom(rect));

    for (let y = top; y < bottom; y++) {
      for (let x = left; x < right; x++) {
        const cell = this.cells[y * this.width + x];
        if (cell) {
          cell.style = patchStyle(cell.style, style);
        }
      }
    }
  }

  /**
   * Write spans on row `y` starting at column `x`, writing at most
   * `maxWidth` cells. Each span's style is layered over the cell's style.
   * Control characters take no cell and are skipped.
   *
   * @returns The column after the last written cell
   */
  setSpans(x: number, y: number, spans: readonly Span[], maxWidth: number): number {
    if (y < 0 || y >= this.height) {
      return x;
    }

    const limit = Math.min(this.width, x + Math.max(0, maxWidth));
    let column = x;

    for (const span of spans) {
      for (const symbol of span.content) {
        if (isControlSymbol(symbol)) continue;
        if (column >= limit) {
          return column;
        }
        const cell = column >= 0 ? this.cells[y * this.width + column] : undefined;
        if (cell) {
          cell.symbol = symbol;
          cell.style = patchStyle(cell.style, span.style);
        }
        column++;
      }
    }

    return column;
  }

  /**
   * Row contents without styling, trailing blanks kept.
   */
  toPlainLines(): string[] {
    const lines: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let line = "";
      for (let x = 0; x < this.width; x++) {
        line += this.cells[y * this.width + x]?.symbol ?? " ";
      }
      lines.push(line);
    }
    return lines;
  }

  /**
   * Row contents with ANSI styling. Adjacent cells that share a style are
   * emitted as one escape-wrapped run.
   */
  toAnsiLines(options: AnsiOptions = {}): string[] {
    const enabled = !options.noColor;
    const lines: string[] = [];

    for (let y = 0; y < this.height; y++) {
      let line = "";
      let run = "";
      let runStyle: Style = EMPTY_STYLE;

      for (let x = 0; x < this.width; x++) {
        const cell = this.cells[y * this.width + x];
        if (!cell) continue;
        if (run.length > 0 && !styleEquals(runStyle, cell.style)) {
          line += styleText(run, runStyle, enabled);
          run = "";
        }
        if (run.length === 0) {
          runStyle = cell.style;
        }
        run += cell.symbol;
      }

      line += styleText(run, runStyle, enabled);
      lines.push(line);
    }

    return lines;
  }
}
