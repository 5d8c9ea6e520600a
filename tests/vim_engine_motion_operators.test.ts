import { describe, expect, test } from "vitest";
import { VimSimulator } from "../src/lib/vim-simulator";

function run(text: string, keys: string): string {
  const simulator = new VimSimulator(text);
  simulator.processInput(keys);
  return simulator.getContent();
}

describe("motion/operator combos", () => {
  test.each([
    ["dw deletes word", "foo bar baz", "dw", "bar baz"],
    ["d$ deletes to end of line", "abc def", "d$", ""],
    ["caw changes a word", "hello world", "cawbye<Esc>", "byeworld"],
    ["ct, changes up to a comma", "abc,def", "ct,XYZ<Esc>", "XYZ,def"],
    ['ci" changes inside quotes', 'say "hello" now', 'f"ci"bye<Esc>', 'say "bye" now'],
    ["gUiw uppercases a word", "hello world", "wgUiw", "hello WORLD"],
    ["2J joins two lines", "a\nb\nc\nd", "2J", "a b\nc\nd"],
    ["3dd ignores the trailing newline", "1\n2\n3\n4\n5\n", "3dd", "4\n5"],
    ["yyjp puts below the next line", "one\ntwo\nthree", "yyjp", "one\ntwo\none\nthree"],
  ])("%s", (_name, text, keys, expected) => {
    expect(run(text, keys)).toBe(expected);
  });
});

describe("command line and insert scenarios", () => {
  test.each([
    ["global substitute", "foo foo\nbar", ":%s/foo/bar/g<CR>", "bar bar\nbar"],
    ["& in the replacement", "aa\nab", ":%s/a/&x/g<CR>", "axax\naxb"],
    ["block insert prefix", "a\nb\nc", "<C-v>jjI# <Esc>", "# a\n# b\n# c"],
    ["append then repeat", "a\nb", "A;<Esc>j.", "a;\nb;"],
    ["<C-u> clears what was typed", "abc", "i123<C-u>xyz<Esc>", "xyzabc"],
    ["<C-w> deletes the previous word", "foo", "A bar<C-w><Esc>", "foo "],
  ])("%s", (_name, text, keys, expected) => {
    expect(run(text, keys)).toBe(expected);
  });
});
