/**
 * Unit tests for the line composer
 */

import { describe, it, expect } from "vitest";
import { composeLines, measureHeight, lineText, cellWidth, DEFAULT_MATCH_STYLE } from "../../../../src/widgets/log-list/line-composer.js";

function texts(text: string, width: number, query = ""): string[] {
  return composeLines(text, width, query).map(lineText);
}

describe("composeLines", () => {
  describe("word wrap", () => {
    it("packs words greedily up to the width", () => {
      expect(texts("hello world foo", 11)).toEqual(["hello world", "foo"]);
    });

    it("keeps a line that fits exactly", () => {
      expect(texts("hello world", 11)).toEqual(["hello world"]);
    });

    it("hard-breaks a word longer than the width", () => {
      expect(texts("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
    });

    it("starts a long word on a fresh line before breaking it", () => {
      expect(texts("ab abcdefgh", 4)).toEqual(["ab", "abcd", "efgh"]);
    });

    it("drops whitespace at wrap points", () => {
      expect(texts("a   b", 3)).toEqual(["a", "b"]);
    });

    it("keeps inner whitespace on a line", () => {
      expect(texts("a   b", 10)).toEqual(["a   b"]);
    });

    it("keeps leading indentation when it fits with the first word", () => {
      expect(texts("  at foo", 10)).toEqual(["  at foo"]);
      expect(texts("  at foo", 4)).toEqual(["  at", "foo"]);
    });

    it("counts code points, not UTF-16 units", () => {
      expect(texts("héllo wörld", 5)).toEqual(["héllo", "wörld"]);
      expect(cellWidth("😀ab")).toBe(3);
    });
  });

  describe("explicit line breaks", () => {
    it("preserves newlines as forced boundaries", () => {
      expect(texts("one\ntwo", 10)).toEqual(["one", "two"]);
    });

    it("treats CRLF like LF", () => {
      expect(texts("a\r\nb", 10)).toEqual(["a", "b"]);
    });

    it("keeps blank paragraphs as empty rows", () => {
      expect(texts("a\n\nb", 10)).toEqual(["a", "", "b"]);
    });
  });

  describe("control characters", () => {
    it("turns a tab into a single space", () => {
      expect(texts("\tat foo", 10)).toEqual([" at foo"]);
    });

    it("removes colour escape sequences", () => {
      expect(texts("\x1b[31mERROR\x1b[0m boom", 20)).toEqual(["ERROR boom"]);
      expect(measureHeight("\x1b[31mERROR\x1b[0m boom", 5)).toBe(2);
    });

    it("gives control characters no width", () => {
      expect(cellWidth("a\x1bb")).toBe(2);
    });
  });

  describe("empty input", () => {
    it("yields exactly one empty line for empty text", () => {
      const lines = composeLines("", 10, "");
      expect(lines).toEqual([[]]);
      expect(measureHeight("", 10)).toBe(1);
    });

    it("yields one empty line for whitespace-only text", () => {
      expect(texts("    ", 2)).toEqual([""]);
    });
  });

  describe("search highlighting", () => {
    it("splits matches into highlighted spans", () => {
      const lines = composeLines("error: disk error", 40, "error", { base: {}, match: { bg: "red" } });

      expect(lines).toEqual([
        [
          { content: "error", style: { bg: "red" } },
          { content: ": disk ", style: {} },
          { content: "error", style: { bg: "red" } },
        ],
      ]);
    });

    it("layers the match style over the base style", () => {
      const lines = composeLines("find me", 20, "me", { base: { fg: "red", bold: true }, match: { bg: "yellow" } });

      expect(lines[0]).toEqual([
        { content: "find ", style: { fg: "red", bold: true } },
        { content: "me", style: { fg: "red", bold: true, bg: "yellow" } },
      ]);
    });

    it("uses the default match style when none is given", () => {
      expect(composeLines("x", 5, "x")).toEqual([[{ content: "x", style: DEFAULT_MATCH_STYLE }]]);
    });

    it("is case-sensitive", () => {
      const lines = composeLines("Error error", 20, "error", { match: { bg: "red" } });

      expect(lines[0]).toEqual([
        { content: "Error ", style: {} },
        { content: "error", style: { bg: "red" } },
      ]);
    });

    it("finds non-overlapping occurrences", () => {
      const lines = composeLines("aaaa", 10, "aa", { match: { bg: "red" } });

      expect(lines[0]).toEqual([
        { content: "aa", style: { bg: "red" } },
        { content: "aa", style: { bg: "red" } },
      ]);
    });

    it("highlights both halves of a match cut by a wrap point", () => {
      const lines = composeLines("abcdef", 3, "cd", { match: { bg: "red" } });

      expect(lines).toEqual([
        [
          { content: "ab", style: {} },
          { content: "c", style: { bg: "red" } },
        ],
        [
          { content: "d", style: { bg: "red" } },
          { content: "ef", style: {} },
        ],
      ]);
    });

    it("never changes the text of any row", () => {
      const samples = ["2024-01-01 INFO server started on port 8080", "  at handler (src/app.ts:10:5)\n  at next", "aaaaaaaaaaaaaaaaaaaa", ""];
      const queries = ["a", "port", "at ", "zzz"];

      for (const text of samples) {
        for (const width of [1, 3, 7, 20]) {
          const plain = texts(text, width);
          for (const query of queries) {
            expect(texts(text, width, query)).toEqual(plain);
          }
        }
      }
    });
  });

  describe("height", () => {
    it("equals the number of composed lines", () => {
      for (const width of [1, 4, 10, 80]) {
        const text = "the quick brown fox jumps over the lazy dog\nsecond line";
        expect(measureHeight(text, width)).toBe(composeLines(text, width, "").length);
      }
    });

    it("does not depend on the query", () => {
      const text = "warn warn warn warn";
      expect(composeLines(text, 6, "warn").length).toBe(measureHeight(text, 6));
    });
  });

  it("returns identical output for identical arguments", () => {
    const first = composeLines("retry failed after 3 attempts", 8, "fail");
    const second = composeLines("retry failed after 3 attempts", 8, "fail");
    expect(second).toEqual(first);
  });

  it("rejects a non-positive width", () => {
    expect(() => composeLines("text", 0, "")).toThrow(RangeError);
    expect(() => measureHeight("text", -1)).toThrow(RangeError);
  });
});
