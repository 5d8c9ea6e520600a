import { describe, expect, test } from "vitest";
import { RegisterStore, isMacroRegister, isValidRegister } from "./vim-registers";

describe("RegisterStore", () => {
  test("a yank fills the unnamed register and register 0", () => {
    const registers = new RegisterStore();
    registers.yank("word", undefined, false);
    expect(registers.read('"')).toEqual({ text: "word", linewise: false });
    expect(registers.read("0")).toEqual({ text: "word", linewise: false });
  });

  test("deletes shift the numbered registers", () => {
    const registers = new RegisterStore();
    registers.delete("first", undefined, true);
    registers.delete("second", undefined, true);
    expect(registers.read("1")).toEqual({ text: "second", linewise: true });
    expect(registers.read("2")).toEqual({ text: "first", linewise: true });
    expect(registers.read("-")).toBeNull();
  });

  test("a small delete also fills the minus register", () => {
    const registers = new RegisterStore();
    registers.delete("x", undefined, false);
    expect(registers.read("-")).toEqual({ text: "x", linewise: false });
    expect(registers.read('"')).toEqual({ text: "x", linewise: false });
  });

  test("a named register is copied to the unnamed one", () => {
    const registers = new RegisterStore();
    registers.yank("abc", "a", false);
    expect(registers.read("a")?.text).toBe("abc");
    expect(registers.read('"')?.text).toBe("abc");
    expect(registers.read("0")).toBeNull();
  });

  test("uppercase names append", () => {
    const registers = new RegisterStore();
    registers.write("a", "one");
    registers.write("A", "two");
    expect(registers.read("a")).toEqual({ text: "onetwo", linewise: false });
    registers.write("A", "three", true);
    expect(registers.read("A")).toEqual({ text: "onetwo\nthree", linewise: true });
  });

  test("the black hole register keeps nothing", () => {
    const registers = new RegisterStore();
    registers.yank("keep", undefined, false);
    registers.delete("gone", "_", false);
    expect(registers.read('"')?.text).toBe("keep");
    expect(registers.read("_")).toBeNull();
  });

  test("list orders unnamed, numbered, then named", () => {
    const registers = new RegisterStore();
    registers.write("b", "bee");
    registers.write("0", "zero");
    registers.write('"', "unnamed");
    expect(registers.list().map(([name]) => name)).toEqual(['"', "0", "b"]);
  });

  test("restore drops invalid names", () => {
    const registers = new RegisterStore();
    registers.restore({ a: { text: "x", linewise: false }, "%": { text: "y", linewise: false } });
    expect(Object.keys(registers.snapshot())).toEqual(["a"]);
  });

  test("restore files upper-case names under the lower-case register", () => {
    const registers = new RegisterStore();
    registers.restore({ A: { text: "x", linewise: true } });
    expect(registers.read("a")).toEqual({ text: "x", linewise: true });
    expect(registers.snapshot()).toEqual({ a: { text: "x", linewise: true } });
  });

  test("register names", () => {
    expect(isValidRegister("a")).toBe(true);
    expect(isValidRegister("%")).toBe(false);
    expect(isMacroRegister("_")).toBe(false);
    expect(isMacroRegister("q")).toBe(true);
  });
});
