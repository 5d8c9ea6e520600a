import { describe, expect, test } from "vitest";
import type { Position, TextObject } from "./vim-types";
import { getTextObject, isEmptyRange } from "./vim-text-object";

function range(lines: string[], cursor: Position, object: TextObject, count = 1) {
  const found = getTextObject(lines, cursor, object, count);
  if (!found) return null;
  return [found.start.line, found.start.col, found.end.line, found.end.col, found.linewise];
}

describe("word objects", () => {
  test("iw covers the word", () => {
    expect(range(["foo bar"], { line: 0, col: 5 }, { kind: "word", around: false })).toEqual([
      0, 4, 0, 6, false,
    ]);
  });

  test("aw takes trailing blanks", () => {
    expect(range(["foo bar"], { line: 0, col: 1 }, { kind: "word", around: true })).toEqual([
      0, 0, 0, 3, false,
    ]);
  });

  test("aw on the last word takes leading blanks", () => {
    expect(range(["foo bar"], { line: 0, col: 5 }, { kind: "word", around: true })).toEqual([
      0, 3, 0, 6, false,
    ]);
  });

  test("iW spans punctuation", () => {
    expect(range(["a x.y b"], { line: 0, col: 2 }, { kind: "WORD", around: false })).toEqual([
      0, 2, 0, 4, false,
    ]);
  });

  test("nothing on an empty line", () => {
    expect(range([""], { line: 0, col: 0 }, { kind: "word", around: false })).toBeNull();
  });
});

describe("quote objects", () => {
  const line = ['say "hi there" now'];

  test('i" finds the next quoted string', () => {
    expect(range(line, { line: 0, col: 0 }, { kind: "quote", around: false, quote: '"' })).toEqual([
      0, 5, 0, 12, false,
    ]);
  });

  test('a" includes the quotes and trailing blanks', () => {
    expect(range(line, { line: 0, col: 6 }, { kind: "quote", around: true, quote: '"' })).toEqual([
      0, 4, 0, 14, false,
    ]);
  });

  test("no quotes", () => {
    expect(range(["plain"], { line: 0, col: 0 }, { kind: "quote", around: false, quote: "'" })).toBeNull();
  });
});

describe("bracket objects", () => {
  test("i( on the innermost pair", () => {
    expect(range(["f(a, (b))"], { line: 0, col: 6 }, { kind: "bracket", around: false, open: "(" })).toEqual([
      0, 6, 0, 6, false,
    ]);
  });

  test("a count reaches the outer pair", () => {
    expect(
      range(["f(a, (b))"], { line: 0, col: 6 }, { kind: "bracket", around: false, open: "(" }, 2)
    ).toEqual([0, 2, 0, 7, false]);
  });

  test("a( includes the brackets", () => {
    expect(range(["f(a, (b))"], { line: 0, col: 2 }, { kind: "bracket", around: true, open: "(" })).toEqual([
      0, 1, 0, 8, false,
    ]);
  });

  test("empty pair gives an empty range", () => {
    const found = getTextObject(["()"], { line: 0, col: 0 }, { kind: "bracket", around: false, open: "(" });
    expect(found).not.toBeNull();
    if (found) expect(isEmptyRange(found)).toBe(true);
  });

  test("a block on its own lines is linewise", () => {
    expect(
      range(["if {", "  x", "}"], { line: 1, col: 2 }, { kind: "bracket", around: false, open: "{" })
    ).toEqual([1, 0, 1, 2, true]);
  });

  test("cursor outside any pair", () => {
    expect(range(["a (b)"], { line: 0, col: 0 }, { kind: "bracket", around: false, open: "(" })).toBeNull();
  });
});

describe("paragraph objects", () => {
  const lines = ["a", "b", "", "c"];

  test("ip is the run of non-blank lines", () => {
    expect(range(lines, { line: 0, col: 0 }, { kind: "paragraph", around: false })).toEqual([
      0, 0, 1, 0, true,
    ]);
  });

  test("ap adds the following blank lines", () => {
    expect(range(lines, { line: 1, col: 0 }, { kind: "paragraph", around: true })).toEqual([
      0, 0, 2, 0, true,
    ]);
  });
});
