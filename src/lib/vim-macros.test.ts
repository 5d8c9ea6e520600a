import { afterEach, describe, expect, test, vi } from "vitest";
import type { RegisterEntry } from "./vim-types";
import { MacroRecorder } from "./vim-macros";
import { mergeOptions } from "./vim-options";
import { VimSimulator } from "./vim-simulator";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("MacroRecorder", () => {
  test("records tokens and encodes them", () => {
    const macros = new MacroRecorder(mergeOptions());
    macros.startRecording("a");
    for (const token of ["i", "<", "<Esc>"]) macros.record(token);
    expect(macros.stopRecording()).toEqual({ register: "a", keys: "i<lt><Esc>" });
    expect(macros.recording).toBeNull();
  });

  test("stopRecording without a recording", () => {
    expect(new MacroRecorder(mergeOptions()).stopRecording()).toBeNull();
  });

  test("plays a register count times", () => {
    const macros = new MacroRecorder(mergeOptions());
    const fed: string[] = [];
    const registers: Record<string, RegisterEntry> = { q: { text: "ab", linewise: false } };
    const outcome = macros.play(
      "q",
      2,
      (name) => registers[name] ?? null,
      (token) => {
        fed.push(token);
        return { message: null, failed: false };
      }
    );
    expect(fed).toEqual(["a", "b", "a", "b"]);
    expect(outcome).toEqual({ message: null, failed: false });
    expect(macros.lastPlayedRegister).toBe("q");
  });

  test("a failing key stops playback", () => {
    const macros = new MacroRecorder(mergeOptions());
    const fed: string[] = [];
    const outcome = macros.play(
      "q",
      5,
      () => ({ text: "xy", linewise: false }),
      (token) => {
        fed.push(token);
        return { message: null, failed: token === "y" };
      }
    );
    expect(fed).toEqual(["x", "y"]);
    expect(outcome.failed).toBe(true);
  });

  test("empty registers and @@ without history", () => {
    const macros = new MacroRecorder(mergeOptions());
    const feed = () => ({ message: null, failed: false });
    expect(macros.play("z", 1, () => null, feed)).toEqual({
      message: "E353: Nothing in register z",
      failed: true,
    });
    expect(macros.play("@", 1, () => null, feed)).toEqual({
      message: "E748: No previously used register",
      failed: true,
    });
  });

  test("the key budget ends runaway playback", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const macros = new MacroRecorder(mergeOptions({ maxMacroKeys: 3 }));
    let fed = 0;
    const outcome = macros.play(
      "q",
      10,
      () => ({ text: "j", linewise: false }),
      () => {
        fed++;
        return { message: null, failed: false };
      }
    );
    expect(fed).toBe(3);
    expect(outcome).toEqual({ message: "E169: Command too recursive", failed: true });
    expect(warn).toHaveBeenCalledWith(
      "[VimEngine] Macro replayed more than 3 keys; playback aborted"
    );
  });
});

describe("macros in the simulator", () => {
  test("@@ replays the last register", () => {
    const simulator = new VimSimulator("abcdef");
    simulator.processInput("qaxq@a@@");
    expect(simulator.getContent()).toBe("def");
  });

  test("a failed motion aborts the remaining repetitions", () => {
    const simulator = new VimSimulator("ab\ncd\nef");
    simulator.processInput("qaxjq5@a");
    expect(simulator.getContent()).toBe("b\nd\nf");
  });

  test("a macro that calls itself stops at the nesting limit", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const simulator = new VimSimulator("text");
    simulator.processInput("qa@aq");
    const outcome = simulator.processInput("@a");
    expect(outcome.statusMessage).toBe("E169: Command too recursive");
    expect(warn).toHaveBeenCalledWith(
      "[VimEngine] Macro nesting exceeded 20 levels; playback aborted"
    );
    expect(simulator.getContent()).toBe("text");
  });

  test("keys typed while recording are what the register holds", () => {
    const simulator = new VimSimulator("x");
    simulator.processInput("qbA!<Esc>q");
    simulator.processInput('"bp');
    expect(simulator.getContent()).toBe("x!A!<Esc>");
  });

  test("the recording shows in the display state", () => {
    const simulator = new VimSimulator("x");
    simulator.processInput("qc");
    expect(simulator.getDisplayState().recording).toBe("c");
    simulator.processInput("q");
    expect(simulator.getDisplayState().recording).toBeNull();
  });
});
