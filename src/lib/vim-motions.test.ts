import { describe, expect, test } from "vitest";
import type { BufferMotion, Position } from "./vim-types";
import { resolveMotion, type MotionContext } from "./vim-motions";

const context: MotionContext = { preferredCol: 0, lastFind: null, forOperator: false };

function target(
  lines: string[],
  cursor: Position,
  motion: BufferMotion,
  count = 1,
  overrides: Partial<MotionContext> = {}
) {
  return resolveMotion(lines, cursor, motion, count, { ...context, ...overrides });
}

describe("word motions", () => {
  test("trailing punctuation belongs to the word", () => {
    expect(target(["hello, world"], { line: 0, col: 0 }, { kind: "wordForward" })?.pos.col).toBe(7);
    expect(target(["hello, world"], { line: 0, col: 0 }, { kind: "WORDForward" })?.pos.col).toBe(7);
  });

  test("punctuation inside a word starts a new word", () => {
    expect(target(["foo.bar baz"], { line: 0, col: 0 }, { kind: "wordForward" })?.pos.col).toBe(3);
    expect(target(["foo.bar baz"], { line: 0, col: 0 }, { kind: "WORDForward" })?.pos.col).toBe(8);
  });

  test("w on the last word lands on the last character", () => {
    expect(target(["foo bar"], { line: 0, col: 4 }, { kind: "wordForward" })?.pos).toEqual({
      line: 0,
      col: 6,
    });
  });

  test("an operator's w stops at the end of the line", () => {
    const lines = ["foo", "bar"];
    expect(
      target(lines, { line: 0, col: 0 }, { kind: "wordForward" }, 1, { forOperator: true })?.pos
    ).toEqual({ line: 0, col: 3 });
  });

  test("b and e", () => {
    expect(target(["foo bar"], { line: 0, col: 4 }, { kind: "wordBack" })?.pos.col).toBe(0);
    const end = target(["foo bar"], { line: 0, col: 0 }, { kind: "wordEnd" });
    expect(end).toEqual({ pos: { line: 0, col: 2 }, linewise: false, inclusive: true });
  });

  test("counts", () => {
    expect(target(["a b c d"], { line: 0, col: 0 }, { kind: "wordForward" }, 3)?.pos.col).toBe(6);
  });
});

describe("line and find motions", () => {
  test("up and down fail at the buffer edges", () => {
    expect(target(["a", "b"], { line: 0, col: 0 }, { kind: "up" })).toBeNull();
    expect(target(["a", "b"], { line: 1, col: 0 }, { kind: "down" })).toBeNull();
  });

  test("^ skips indentation", () => {
    expect(target(["   x"], { line: 0, col: 0 }, { kind: "lineFirstNonBlank" })?.pos.col).toBe(3);
  });

  test("f with a count", () => {
    const find = { kind: "findChar", char: ",", direction: "f" } as const;
    expect(target(["a,b,c"], { line: 0, col: 0 }, find, 2)?.pos.col).toBe(3);
  });

  test("; after t moves past the adjacent match", () => {
    const lastFind = { char: ",", direction: "t" } as const;
    expect(
      target(["a,b,c"], { line: 0, col: 0 }, { kind: "repeatFind" }, 1, { lastFind })?.pos.col
    ).toBe(2);
  });

  test("missing character fails", () => {
    const find = { kind: "findChar", char: "z", direction: "f" } as const;
    expect(target(["abc"], { line: 0, col: 0 }, find)).toBeNull();
  });

  test("G and gg are linewise", () => {
    expect(target(["a", "  b"], { line: 0, col: 0 }, { kind: "fileEnd" })).toEqual({
      pos: { line: 1, col: 2 },
      linewise: true,
      inclusive: true,
    });
  });
});

describe("structural motions", () => {
  test("} stops on the next blank line", () => {
    expect(
      target(["a", "b", "", "c"], { line: 0, col: 0 }, { kind: "paragraphForward" })?.pos
    ).toEqual({ line: 2, col: 0 });
  });

  test("{ goes back to the previous blank line", () => {
    expect(
      target(["a", "", "b", "c"], { line: 3, col: 0 }, { kind: "paragraphBack" })?.pos
    ).toEqual({ line: 1, col: 0 });
  });

  test("% jumps to the matching bracket", () => {
    expect(target(["(a [b])"], { line: 0, col: 0 }, { kind: "matchPair" })?.pos.col).toBe(6);
    expect(target(["(a [b])"], { line: 0, col: 5 }, { kind: "matchPair" })?.pos.col).toBe(3);
  });
});
