/**
 * Terminal Text
 *
 * Log lines may carry tabs, colour escapes or other control characters
 * that would move the terminal cursor if written into a cell.
 */

import stripAnsi from "strip-ansi";

const CONTROL_PATTERN = /[\u0000-\u0008\u000b-\u001f\u007f-\u009f]/g;

/** True for C0 and C1 control code points, which occupy no cell */
export function isControlSymbol(symbol: string): boolean {
  const code = symbol.codePointAt(0);
  return code !== undefined && (code < 0x20 || (code >= 0x7f && code <= 0x9f));
}

/**
 * Make text safe to draw: ANSI escape sequences are removed, tabs become
 * a single space, CRLF becomes LF and every other control character except
 * LF is dropped.
 */
export function sanitizeText(text: string): string {
  return stripAnsi(text).replace(/\t/g, " ").replace(/\r\n/g, "\n").replace(CONTROL_PATTERN, "");
}
