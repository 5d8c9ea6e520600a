import { afterEach, describe, expect, test, vi } from "vitest";
import { SimulatorContractError } from "./vim-errors";
import { VimSimulator } from "./vim-simulator";

function run(text: string, keys: string): VimSimulator {
  const simulator = new VimSimulator(text);
  simulator.processInput(keys);
  return simulator;
}

describe("operators and motions", () => {
  test("dw", () => expect(run("foo bar baz", "dw").getContent()).toBe("bar baz"));
  test("d$", () => expect(run("abc def", "wd$").getContent()).toBe("abc "));
  test("cw stops at the end of the word", () =>
    expect(run("foo bar", "cwxy<Esc>").getContent()).toBe("xy bar"));
  test("caw", () => expect(run("hello world", "cawbye<Esc>").getContent()).toBe("byeworld"));
  test("ci( on an inner range", () =>
    expect(run("f(a, b)", "faci(x<Esc>").getContent()).toBe("f(x)"));
  test("ci( on an empty pair starts inserting inside", () =>
    expect(run("f()", "f(ci(x<Esc>").getContent()).toBe("f(x)"));
  test("dj is linewise", () => expect(run("a\nb\nc", "dj").getContent()).toBe("c"));
  test("yank and put", () => expect(run("a", "yyp").getContent()).toBe("a\na"));
  test("P puts before", () => expect(run("ab", "xP").getContent()).toBe("ab"));
  test("gU with a motion", () => expect(run("foo bar", "gUw").getContent()).toBe("FOO bar"));
  test("~ toggles and advances", () => expect(run("abc", "~~").getContent()).toBe("ABc"));
  test("r with a count", () => expect(run("abcd", "3rx").getContent()).toBe("xxxd"));
  test("r past the end fails", () => expect(run("ab", "3rx").getContent()).toBe("ab"));
  test("J joins with one space", () => {
    const simulator = run("foo\n  bar", "J");
    expect(simulator.getContent()).toBe("foo bar");
    expect(simulator.getDisplayState().cursorPos).toEqual({ line: 0, col: 3 });
  });
  test(">> indents by shiftwidth", () => expect(run("x", ">>").getContent()).toBe("  x"));
  test("d/ deletes up to the match", () =>
    expect(run("foo bar", "d/bar<CR>").getContent()).toBe("bar"));
});

describe("insert mode", () => {
  test("counts repeat the typed text", () => expect(run("", "3ia<Esc>").getContent()).toBe("aaa"));
  test("o with a count opens several lines", () =>
    expect(run("a", "2ox<Esc>").getContent()).toBe("a\nx\nx"));
  test("Esc steps back one column", () => {
    const simulator = run("", "iabc<Esc>");
    expect(simulator.getDisplayState().cursorPos).toEqual({ line: 0, col: 2 });
    expect(simulator.getMode()).toBe("normal");
  });
  test("backspace joins lines at column 0", () =>
    expect(run("ab\ncd", "ji<BS><Esc>").getContent()).toBe("abcd"));
  test("C-w deletes the word before the cursor", () =>
    expect(run("", "ifoo bar<C-w><Esc>").getContent()).toBe("foo "));
  test("C-r inserts a register", () =>
    expect(run("word", "yiwA <C-r>\"<Esc>").getContent()).toBe("word word"));
  test("replace mode overwrites and backspace restores", () => {
    expect(run("abc", "Rxy<Esc>").getContent()).toBe("xyc");
    expect(run("abc", "Rxy<BS><Esc>").getContent()).toBe("xbc");
  });
  test("the whole insert is one undo step", () =>
    expect(run("", "ihello<Esc>u").getContent()).toBe(""));
  test("Del removes the character under the cursor", () =>
    expect(run("abc", "i<Del><Esc>").getContent()).toBe("bc"));
  test("Del at the end of a line joins the next one", () =>
    expect(run("ab\ncd", "A<Del><Esc>").getContent()).toBe("abcd"));
  test("autoindent copies the indent on Enter and o", () => {
    const simulator = new VimSimulator("  foo", { autoindent: true });
    simulator.processInput("A<CR>bar<Esc>obaz<Esc>");
    expect(simulator.getContent()).toBe("  foo\n  bar\n  baz");
  });
  test("without autoindent new lines start at column 0", () =>
    expect(run("  foo", "A<CR>bar<Esc>").getContent()).toBe("  foo\nbar"));
});

describe("large counts", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const quiet = () => vi.spyOn(console, "warn").mockImplementation(() => {});

  test.each([
    ["charwise put", "yiw999999999p"],
    ["linewise put", "yy999999999p"],
    ["visual shift", "V999999999>"],
  ])("%s past the size limit is refused without an undo step", (_name, keys) => {
    const warn = quiet();
    const simulator = new VimSimulator("hello\nworld");
    const outcome = simulator.processInput(keys);
    expect(outcome.statusMessage).toBe("E1240: Resulting text too long");
    expect(simulator.getContent()).toBe("hello\nworld");
    expect(warn).toHaveBeenCalledWith(
      "[VimEngine] Aborting: text would exceed 2000000 characters"
    );
    expect(simulator.processInput("u").statusMessage).toBe("Already at oldest change");
  });

  test("an insert count too large keeps a single copy", () => {
    quiet();
    const simulator = new VimSimulator("hello\nworld");
    const outcome = simulator.processInput("999999999ixyz<Esc>");
    expect(outcome.statusMessage).toBe("E1240: Resulting text too long");
    expect(simulator.getContent()).toBe("xyzhello\nworld");
    expect(simulator.getMode()).toBe("normal");
  });

  test("n with a huge count lands where stepping would", () => {
    const simulator = new VimSimulator("hello\nworld");
    simulator.processInput("/o<CR>");
    const outcome = simulator.processInput("999999999n");
    expect(outcome.cursorPos).toEqual({ line: 1, col: 1 });
  });

  test("@: with a huge count stops once nothing changes", () => {
    const simulator = new VimSimulator("hello\nworld");
    simulator.processInput(":s/o/0/<CR>");
    simulator.processInput("999999999@:");
    expect(simulator.getContent()).toBe("hell0\nworld");
  });
});

describe("visual mode", () => {
  test("charwise delete is inclusive", () => expect(run("abcdef", "vlld").getContent()).toBe("def"));
  test("block insert lands on every line", () =>
    expect(run("abc\nabc\nabc", "<C-v>jjI-<Esc>").getContent()).toBe("-abc\n-abc\n-abc"));
  test("block append pads short lines", () =>
    expect(run("ab\na\nab", "l<C-v>jjA;<Esc>").getContent()).toBe("ab;\na ;\nab;"));
  test("put over a selection swaps the text", () => {
    const simulator = run("one two", "yiwwviwp");
    expect(simulator.getContent()).toBe("one one");
    simulator.processInput("0p");
    expect(simulator.getContent()).toBe("otwone one");
  });
  test("iw extends the selection", () =>
    expect(run("foo bar", "wviwd").getContent()).toBe("foo "));
  test("o swaps the ends", () => {
    const simulator = run("abcdef", "lvllo");
    expect(simulator.getDisplayState().cursorPos).toEqual({ line: 0, col: 1 });
    expect(simulator.getDisplayState().selection).toEqual({
      kind: "char",
      start: { line: 0, col: 1 },
      end: { line: 0, col: 3 },
    });
  });
  test("U uppercases the selection", () =>
    expect(run("abc", "vlU").getContent()).toBe("ABc"));
});

describe("repeat and undo", () => {
  test(". repeats a delete", () => expect(run("a b c", "dw.").getContent()).toBe("c"));
  test(". repeats a change with its typed text", () =>
    expect(run("foo bar", "ciwX<Esc>w.").getContent()).toBe("X X"));
  test("a count on . replaces the original count", () =>
    expect(run("abcdef", "2x3.").getContent()).toBe("f"));
  test("undo restores the cursor too", () => {
    const simulator = run("foo bar", "wdwu");
    expect(simulator.getContent()).toBe("foo bar");
    expect(simulator.getDisplayState().cursorPos).toEqual({ line: 0, col: 4 });
  });
  test("undo with nothing to undo", () => {
    const simulator = new VimSimulator("x");
    expect(simulator.processInput("u").statusMessage).toBe("Already at oldest change");
    expect(simulator.processInput("<C-r>").statusMessage).toBe("Already at newest change");
  });
});

describe("status messages", () => {
  test("search misses", () => {
    const simulator = new VimSimulator("abc");
    expect(simulator.processInput("/zzz<CR>").statusMessage).toBe("E486: Pattern not found: zzz");
    expect(simulator.getMode()).toBe("normal");
  });

  test("n before any search", () => {
    expect(new VimSimulator("abc").processInput("n").statusMessage).toBe(
      "E35: No previous regular expression"
    );
  });

  test("wrapping around", () => {
    const simulator = new VimSimulator("foo\nfoo");
    simulator.processInput("j");
    expect(simulator.processInput("/foo<CR>").statusMessage).toBe(
      "search hit BOTTOM, continuing at TOP"
    );
  });

  test("empty register", () => {
    expect(new VimSimulator("abc").processInput("p").statusMessage).toBe(
      'E353: Nothing in register "'
    );
  });

  test("unknown keys", () => {
    expect(new VimSimulator("abc").processInput("Z").statusMessage).toBe(
      "Not an editor command: Z"
    );
  });
});

describe("confirm flow", () => {
  test("y and n answer one match at a time", () => {
    const simulator = new VimSimulator("foo foo foo");
    const prompt = simulator.processInput(":s/foo/bar/gc<CR>");
    expect(prompt.statusMessage).toBe("replace with bar (y/n/a/q/l)?");
    expect(prompt.mode).toBe("command");
    simulator.processInput("y");
    simulator.processInput("n");
    const done = simulator.processInput("y");
    expect(done.mode).toBe("normal");
    expect(simulator.getContent()).toBe("bar foo bar");
  });

  test("a accepts the rest", () => {
    const simulator = run("foo foo foo", ":s/foo/bar/gc<CR>na");
    expect(simulator.getContent()).toBe("foo bar bar");
  });

  test("q keeps what was accepted", () => {
    const simulator = run("foo foo", ":s/foo/bar/gc<CR>yq");
    expect(simulator.getContent()).toBe("bar foo");
  });
});

describe("public surface", () => {
  test("processInput reports the outcome", () => {
    const outcome = new VimSimulator("abc").processInput("x");
    expect(outcome).toEqual({
      mode: "normal",
      cursorPos: { line: 0, col: 0 },
      linesSnapshot: ["bc"],
      bufferChanged: true,
      statusMessage: null,
      pending: "",
    });
  });

  test("pending keys are visible", () => {
    const simulator = new VimSimulator("abc");
    expect(simulator.processInput("2d").pending).toBe("2d");
    expect(simulator.getDisplayState().lastCommand).toBeNull();
  });

  test("executeKeystrokes records one step per key", () => {
    const simulator = new VimSimulator("");
    const steps = simulator.executeKeystrokes("ix<Esc>");
    expect(steps.map((step) => step.keystroke)).toEqual(["i", "x", "<Esc>"]);
    expect(steps[1]).toEqual({
      keystroke: "x",
      text: "x",
      cursorLine: 0,
      cursorCol: 1,
      mode: "insert",
      commandLine: null,
    });
    expect(simulator.getSteps()).toHaveLength(4);
  });

  test("the command line shows while typing", () => {
    const simulator = new VimSimulator("abc");
    simulator.processInput(":s/a");
    expect(simulator.getDisplayState().commandLine).toBe(":s/a");
    simulator.processInput("<Esc>");
    expect(simulator.getDisplayState().commandLine).toBeNull();
  });

  test("loadContent keeps registers but clears history", () => {
    const simulator = new VimSimulator("keep");
    simulator.processInput("yy");
    simulator.loadContent("new\n");
    expect(simulator.getContent()).toBe("new");
    expect(simulator.processInput("u").statusMessage).toBe("Already at oldest change");
    simulator.processInput("p");
    expect(simulator.getContent()).toBe("new\nkeep");
  });

  test("reset clears registers", () => {
    const simulator = new VimSimulator("keep");
    simulator.processInput("yy");
    simulator.reset("x");
    expect(simulator.processInput("p").statusMessage).toBe('E353: Nothing in register "');
  });

  test("non-string input is a caller error", () => {
    const simulator = new VimSimulator("");
    expect(() => simulator.loadContent(JSON.parse("42"))).toThrow(SimulatorContractError);
    expect(() => simulator.processInput(JSON.parse("null"))).toThrow(SimulatorContractError);
  });
});

describe("serialization", () => {
  test("state survives a JSON round trip", () => {
    const source = new VimSimulator("one\ntwo");
    source.processInput("yyjvl");
    const state = JSON.parse(JSON.stringify(source.serializeState()));

    const restored = new VimSimulator();
    restored.deserializeState(state);
    expect(restored.getContent()).toBe("one\ntwo");
    expect(restored.getMode()).toBe("visual");
    expect(restored.getDisplayState().selection).toEqual({
      kind: "char",
      start: { line: 1, col: 0 },
      end: { line: 1, col: 1 },
    });
    restored.processInput("<Esc>p");
    expect(restored.getContent()).toBe("one\ntwo\none");
  });

  test("restoring into insert mode keeps typing", () => {
    const source = new VimSimulator("ab");
    source.processInput("A");
    const restored = new VimSimulator();
    restored.deserializeState(source.serializeState());
    restored.processInput("c<Esc>");
    expect(restored.getContent()).toBe("abc");
  });

  test("malformed state is rejected", () => {
    const simulator = new VimSimulator("x");
    expect(() => simulator.deserializeState({ version: 2 })).toThrow(SimulatorContractError);
    const state = simulator.serializeState();
    expect(() =>
      simulator.deserializeState({ ...state, cursor: { line: 3, col: 0 } })
    ).toThrow("[VimEngine] cursor outside the restored text");
    expect(() => simulator.deserializeState({ ...state, mode: "visual" })).toThrow(
      SimulatorContractError
    );
  });
});
