import { describe, expect, test, vi } from "vitest";
import { mergeOptions } from "./vim-options";
import {
  SearchEngine,
  applySubstitution,
  buildSafeRegex,
  renderReplacement,
  vimToJsRegex,
} from "./vim-search";

const forward = "forward" as const;

describe("vimToJsRegex", () => {
  test("magic groups and alternation need a backslash", () => {
    expect(vimToJsRegex("\\(a\\|b\\)").source).toBe("(a|b)");
    expect(vimToJsRegex("(a|b)").source).toBe("\\(a\\|b\\)");
  });

  test("word boundaries", () => {
    expect(vimToJsRegex("\\<foo\\>").source).toBe("\\bfoo\\b");
  });

  test("very magic", () => {
    expect(vimToJsRegex("\\v(a|b)+").source).toBe("(a|b)+");
  });

  test("brace quantifiers", () => {
    expect(vimToJsRegex("a\\{2,3}").source).toBe("a{2,3}");
    expect(vimToJsRegex("a\\{-}").source).toBe("a*?");
  });

  test("case flags", () => {
    expect(vimToJsRegex("\\cfoo")).toEqual({ source: "foo", ignoreCase: true });
  });
});

describe("buildSafeRegex", () => {
  test("invalid patterns match literally", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const regex = buildSafeRegex("a(", "g");
    expect(regex?.test("xa(y")).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });
});

describe("renderReplacement", () => {
  test("& and groups", () => {
    expect(renderReplacement("[&]", "foo", [])).toBe("[foo]");
    expect(renderReplacement("\\2-\\1", "ab", ["a", "b"])).toBe("b-a");
  });

  test("case escapes", () => {
    expect(renderReplacement("\\u&", "word", [])).toBe("Word");
    expect(renderReplacement("\\U&\\E!", "up", [])).toBe("UP!");
  });

  test("\\r breaks the line", () => {
    expect(renderReplacement("a\\rb", "x", [])).toBe("a\nb");
  });

  test("escaped specials are literal", () => {
    expect(renderReplacement("\\&\\/", "x", [])).toBe("&/");
  });
});

describe("SearchEngine", () => {
  test("forward search wraps and reports it", () => {
    const search = new SearchEngine(mergeOptions());
    const lines = ["foo", "bar", "foo"];
    expect(search.search(lines, "foo", forward, { line: 2, col: 0 })).toEqual({ line: 0, col: 0 });
    expect(search.lastWrapped).toBe(true);
  });

  test("nowrapscan stops at the end", () => {
    const search = new SearchEngine(mergeOptions({ wrapscan: false }));
    expect(search.search(["foo", "bar"], "foo", forward, { line: 0, col: 0 })).toBeNull();
  });

  test("n and N reuse the last pattern", () => {
    const search = new SearchEngine(mergeOptions());
    const lines = ["a x a x a"];
    const first = search.search(lines, "a", forward, { line: 0, col: 0 });
    expect(first).toEqual({ line: 0, col: 4 });
    expect(search.repeatNext(lines, { line: 0, col: 4 })).toEqual({ line: 0, col: 8 });
    expect(search.repeatPrevious(lines, { line: 0, col: 4 })).toEqual({ line: 0, col: 0 });
  });

  test("an empty pattern reuses the last one", () => {
    const search = new SearchEngine(mergeOptions());
    expect(search.resolvePattern("")).toBeNull();
    search.search(["abc"], "b", forward, { line: 0, col: 0 });
    expect(search.resolvePattern("")).toBe("b");
  });

  test("smartcase", () => {
    const search = new SearchEngine(mergeOptions({ ignorecase: true, smartcase: true }));
    expect(search.search(["Foo foo"], "foo", forward, { line: 0, col: 0 })).toEqual({ line: 0, col: 4 });
    expect(search.search(["foo Foo"], "Foo", forward, { line: 0, col: 0 })).toEqual({ line: 0, col: 4 });
  });

  test("* searches the whole word under the cursor", () => {
    const search = new SearchEngine(mergeOptions());
    const found = search.searchWordUnderCursor(["foo foobar foo"], { line: 0, col: 0 }, forward);
    expect(found).toEqual({ pattern: "\\<foo\\>", pos: { line: 0, col: 11 } });
  });

  test("planned substitutions apply right to left", () => {
    const search = new SearchEngine(mergeOptions());
    const lines = ["foo foo", "bar"];
    const planned = search.planSubstitution(lines, 0, 1, "foo", "baz", {
      global: true,
      confirm: false,
      ignoreCase: null,
    });
    expect(planned?.length).toBe(2);
    const result = applySubstitution(lines, planned ?? []);
    expect(result.lines).toEqual(["baz baz", "bar"]);
    expect(result.substitutions).toBe(2);
    expect(result.linesChanged).toBe(1);
  });

  test("a replacement line break splits the line", () => {
    const search = new SearchEngine(mergeOptions());
    const planned = search.planSubstitution(["a,b"], 0, 0, ",", "\\r", {
      global: false,
      confirm: false,
      ignoreCase: null,
    });
    expect(applySubstitution(["a,b"], planned ?? []).lines).toEqual(["a", "b"]);
  });
});
