import { describe, expect, test } from "vitest";
import { StreamingVimSimulator } from "./streaming-vim-simulator";
import { checkExercise } from "./exercise-check";

describe("StreamingVimSimulator", () => {
  test("a key name split across chunks waits for its end", () => {
    const stream = new StreamingVimSimulator("");
    expect(stream.appendTokens("ih").map((step) => step.keystroke)).toEqual(["i", "h"]);
    expect(stream.appendTokens("i<Es").map((step) => step.keystroke)).toEqual(["i"]);
    expect(stream.getProcessedKeystrokes()).toBe("ihi");
    expect(stream.getRawKeystrokes()).toBe("ihi<Es");

    const last = stream.appendTokens("c>");
    expect(last).toHaveLength(1);
    expect(last[0].keystroke).toBe("<Esc>");
    expect(last[0].mode).toBe("normal");
    expect(stream.getText()).toBe("hi");
  });

  test("a literal bracket does not stall the stream", () => {
    const stream = new StreamingVimSimulator("");
    stream.appendTokens("ia< b<Esc>");
    expect(stream.getText()).toBe("a< b");
  });

  test("steps accumulate across chunks", () => {
    const stream = new StreamingVimSimulator("one two");
    stream.appendTokens("d");
    stream.appendTokens("w");
    expect(stream.getText()).toBe("two");
    expect(stream.getSteps().map((step) => step.keystroke)).toEqual(["START", "d", "w"]);
  });

  test("the streamed session can be scored", () => {
    const stream = new StreamingVimSimulator("hello world");
    stream.appendTokens("d");
    stream.appendTokens("w");
    const result = checkExercise(stream.getSimulator(), {
      kind: "text",
      expectedText: "world",
      maxKeystrokes: 2,
    });
    expect(result.passed).toBe(true);
    expect(result.score).toBe(100);
  });

  test("reset starts over from the original text", () => {
    const stream = new StreamingVimSimulator("abc");
    stream.appendTokens("x");
    stream.reset();
    expect(stream.getText()).toBe("abc");
    expect(stream.getRawKeystrokes()).toBe("");
    expect(stream.getSteps()).toHaveLength(1);
  });
});
