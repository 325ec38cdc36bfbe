/**
 * Line Composer
 *
 * Turns one log entry into the terminal rows it occupies: explicit line
 * breaks are kept, each paragraph is greedily word-wrapped to the width,
 * and occurrences of the search query become separately styled spans.
 */

import { EMPTY_STYLE, patchStyle } from "../../terminal/style.js";
import { isControlSymbol, sanitizeText } from "../../terminal/text.js";
import type { DisplayLine, Span, Style } from "../../terminal/types.js";

/** Default style layered over the base style for search matches */
export const DEFAULT_MATCH_STYLE: Style = Object.freeze({ fg: "black", bg: "yellow" });

export interface ComposeStyles {
  /** Style for text outside search matches */
  base?: Style;
  /** Style layered over `base` for search matches */
  match?: Style;
}

/** Half-open range of UTF-16 offsets into a paragraph */
interface TextRange {
  start: number;
  end: number;
}

/** Number of cells a string occupies (one per code point, none for control characters) */
export function cellWidth(text: string): number {
  let cells = 0;
  for (const symbol of text) {
    if (!isControlSymbol(symbol)) {
      cells++;
    }
  }
  return cells;
}

function splitParagraphs(text: string): string[] {
  return sanitizeText(text).split("\n");
}

/**
 * Greedy word wrap of a single paragraph.
 * Words longer than the width are broken at the width boundary.
 */
function wrapParagraph(paragraph: string, width: number): TextRange[] {
  const lines: TextRange[] = [];
  const wordPattern = /\S+/g;
  let current: TextRange | null = null;
  let currentCells = 0;
  let isFirstWord = true;
  let match: RegExpExecArray | null;

  while ((match = wordPattern.exec(paragraph)) !== null) {
    const word = match[0];
    const wordStart = match.index;
    const wordEnd = wordStart + word.length;
    const wordCells = cellWidth(word);

    if (current !== null) {
      const gapCells = cellWidth(paragraph.slice(current.end, wordStart));
      if (currentCells + gapCells + wordCells <= width) {
        current.end = wordEnd;
        currentCells += gapCells + wordCells;
        continue;
      }
      lines.push(current);
      current = null;
    } else if (isFirstWord && wordStart > 0) {
      // Keep indentation when it fits together with the first word
      const indentCells = cellWidth(paragraph.slice(0, wordStart));
      if (indentCells + wordCells <= width) {
        current = { start: 0, end: wordEnd };
        currentCells = indentCells + wordCells;
        isFirstWord = false;
        continue;
      }
    }
    isFirstWord = false;

    let chunkStart = wordStart;
    let chunkCells = 0;
    let offset = wordStart;
    for (const symbol of word) {
      if (chunkCells === width) {
        lines.push({ start: chunkStart, end: offset });
        chunkStart = offset;
        chunkCells = 0;
      }
      offset += symbol.length;
      chunkCells++;
    }
    current = { start: chunkStart, end: wordEnd };
    currentCells = chunkCells;
  }

  if (current !== null) {
    lines.push(current);
  }
  if (lines.length === 0) {
    lines.push({ start: 0, end: 0 });
  }
  return lines;
}

/**
 * Non-overlapping, case-sensitive occurrences of `query`, left to right.
 */
function findMatches(paragraph: string, query: string): TextRange[] {
  const matches: TextRange[] = [];
  if (query.length === 0) {
    return matches;
  }

  let from = 0;
  for (;;) {
    const index = paragraph.indexOf(query, from);
    if (index < 0) break;
    matches.push({ start: index, end: index + query.length });
    from = index + query.length;
  }
  return matches;
}

function buildLine(paragraph: string, range: TextRange, matches: readonly TextRange[], base: Style, highlight: Style): DisplayLine {
  const spans: Span[] = [];
  let position = range.start;

  for (const found of matches) {
    if (found.end <= position) continue;
    if (found.start >= range.end) break;

    const start = Math.max(found.start, position);
    const end = Math.min(found.end, range.end);
    if (start > position) {
      spans.push({ content: paragraph.slice(position, start), style: base });
    }
    spans.push({ content: paragraph.slice(start, end), style: highlight });
    position = end;
  }

  if (position < range.end) {
    spans.push({ content: paragraph.slice(position, range.end), style: base });
  }
  return spans;
}

/**
 * Compose the display rows for `text` at the given width.
 *
 * Escape sequences and control characters are removed first and tabs
 * become spaces. Concatenating the spans of each row gives the same text
 * whatever the query is; only span styles change.
 *
 * @throws RangeError when width is not a positive integer
 */
export function composeLines(text: string, width: number, query: string, styles: ComposeStyles = {}): DisplayLine[] {
  if (!Number.isInteger(width) || width <= 0) {
    throw new RangeError(`width must be a positive integer, got ${width}`);
  }

  const base = styles.base ?? EMPTY_STYLE;
  const highlight = patchStyle(base, styles.match ?? DEFAULT_MATCH_STYLE);
  const lines: DisplayLine[] = [];

  for (const paragraph of splitParagraphs(text)) {
    const matches = findMatches(paragraph, query);
    for (const range of wrapParagraph(paragraph, width)) {
      lines.push(buildLine(paragraph, range, matches, base, highlight));
    }
  }

  return lines;
}

/**
 * Rows occupied by `text` at the given width. The search query never
 * changes the height.
 */
export function measureHeight(text: string, width: number): number {
  return composeLines(text, width, "").length;
}

/** Plain text of a display row */
export function lineText(line: DisplayLine): string {
  return line.map((span) => span.content).join("");
}
