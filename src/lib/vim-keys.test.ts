import { describe, expect, test } from "vitest";
import {
  countKeystrokes,
  encodeKeys,
  extractKeystroke,
  insertableText,
  normalizeKey,
  tokenizeKeystrokes,
} from "./vim-keys";

describe("tokenizeKeystrokes", () => {
  test("splits characters and key names", () => {
    expect(tokenizeKeystrokes("ihi<Esc>dw")).toEqual(["i", "h", "i", "<Esc>", "d", "w"]);
  });

  test("normalizes key name spellings", () => {
    expect(tokenizeKeystrokes("<esc><Escape><enter><c-R>")).toEqual([
      "<Esc>",
      "<Esc>",
      "<CR>",
      "<C-r>",
    ]);
  });

  test("unknown names keep the bracket literal", () => {
    expect(tokenizeKeystrokes("<foo>")).toEqual(["<", "f", "o", "o", ">"]);
  });

  test("<lt> is a literal bracket", () => {
    expect(tokenizeKeystrokes("a<lt>b")).toEqual(["a", "<", "b"]);
  });

  test("an unterminated name at the end is literal text", () => {
    expect(tokenizeKeystrokes("x<Es")).toEqual(["x", "<", "E", "s"]);
  });

  test("raw control characters", () => {
    expect(tokenizeKeystrokes("\x1b\r\x7f\x12")).toEqual(["<Esc>", "<CR>", "<BS>", "<C-r>"]);
  });
});

describe("extractKeystroke", () => {
  test("waits on a partial key name", () => {
    expect(extractKeystroke("<Es")).toBeNull();
  });

  test("reads a complete key name", () => {
    expect(extractKeystroke("<Esc>x")).toEqual({ token: "<Esc>", length: 5 });
  });

  test("a bracket followed by a space is literal", () => {
    expect(extractKeystroke("< x")).toEqual({ token: "<", length: 1 });
  });
});

describe("key helpers", () => {
  test("normalizeKey", () => {
    expect(normalizeKey("<C-[>")).toBe("<Esc>");
    expect(normalizeKey("<C-h>")).toBe("<BS>");
    expect(normalizeKey("<Space>")).toBe(" ");
    expect(normalizeKey("x")).toBe("x");
  });

  test("encodeKeys writes literal brackets as <lt>", () => {
    expect(encodeKeys(["i", "<", "<Esc>"])).toBe("i<lt><Esc>");
  });

  test("countKeystrokes counts key names once", () => {
    expect(countKeystrokes("ciwfoo<Esc>")).toBe(7);
  });

  test("insertableText", () => {
    expect(insertableText("a")).toBe("a");
    expect(insertableText("<Tab>")).toBe("\t");
    expect(insertableText("<Esc>")).toBeNull();
  });
});
