import * as Diff from "diff";
import type { Position, VimMode } from "./vim-types";
import type { VimSimulator } from "./vim-simulator";

export type ExerciseGoal =
  | { kind: "text"; expectedText: string; threshold?: number }
  | { kind: "cursor"; expected: Position }
  | { kind: "mode"; expected: VimMode }
  | { kind: "commands"; expected: string[] };

export type ExerciseCheck = ExerciseGoal & { maxKeystrokes?: number };

export interface ExerciseResult {
  passed: boolean;
  /** 0-100 */
  score: number;
  feedback: string;
  diff?: Diff.Change[];
}

const DEFAULT_TEXT_THRESHOLD = 80;
const COMMANDS_PASS_SCORE = 70;

/** Share of the longer text left unchanged by a word diff, 0-100. */
export function textSimilarity(expected: string, actual: string): number {
  if (expected === "" && actual === "") return 100;
  if (expected === "" || actual === "") return 0;
  const common = Diff.diffWordsWithSpace(expected, actual)
    .filter((part) => !part.added && !part.removed)
    .reduce((sum, part) => sum + part.value.length, 0);
  return Math.floor((common / Math.max(expected.length, actual.length)) * 100);
}

function checkText(
  simulator: VimSimulator,
  expectedText: string,
  threshold: number
): ExerciseResult {
  const expected = expectedText.trim();
  const actual = simulator.getContent().trim();
  const diff = Diff.diffWordsWithSpace(expected, actual);
  if (expected === actual) {
    return { passed: true, score: 100, feedback: "Text matches the goal.", diff };
  }
  const score = textSimilarity(expected, actual);
  return {
    passed: score >= threshold,
    score,
    feedback: `Text similarity: ${score}%`,
    diff,
  };
}

function checkCursor(simulator: VimSimulator, expected: Position): ExerciseResult {
  const actual = simulator.getDisplayState().cursorPos;
  const distance =
    Math.abs(actual.line - expected.line) + Math.abs(actual.col - expected.col);
  if (distance === 0) {
    return {
      passed: true,
      score: 100,
      feedback: `Cursor is at ${actual.line}:${actual.col}.`,
    };
  }
  return {
    passed: false,
    score: Math.max(0, 100 - distance * 10),
    feedback: `Cursor at ${actual.line}:${actual.col}, expected ${expected.line}:${expected.col}`,
  };
}

function checkMode(simulator: VimSimulator, expected: VimMode): ExerciseResult {
  const actual = simulator.getMode();
  if (actual === expected) {
    return { passed: true, score: 100, feedback: `In ${actual} mode.` };
  }
  return {
    passed: false,
    score: 0,
    feedback: `Expected ${expected} mode, but the editor is in ${actual} mode`,
  };
}

function typedKeys(simulator: VimSimulator): string[] {
  return simulator
    .getSteps()
    .filter((step) => step.keystroke !== "START")
    .map((step) => step.keystroke);
}

function checkCommands(simulator: VimSimulator, expected: string[]): ExerciseResult {
  const typed = typedKeys(simulator);
  let matched = 0;
  while (matched < typed.length && matched < expected.length && typed[matched] === expected[matched]) {
    matched++;
  }
  if (matched === expected.length && typed.length === expected.length) {
    return { passed: true, score: 100, feedback: "Keys match the expected sequence." };
  }
  // A correct prefix earns partial credit; anything off the path earns none
  if (matched < typed.length || expected.length === 0) {
    return {
      passed: false,
      score: 0,
      feedback: "Keys do not match the expected sequence",
    };
  }
  const score = Math.floor((matched / expected.length) * 100);
  return {
    passed: score >= COMMANDS_PASS_SCORE,
    score,
    feedback: `${matched}/${expected.length} keys correct`,
  };
}

/** Scores the simulator's current state against a lesson goal. */
export function checkExercise(
  simulator: VimSimulator,
  check: ExerciseCheck
): ExerciseResult {
  let result: ExerciseResult;
  switch (check.kind) {
    case "text":
      result = checkText(
        simulator,
        check.expectedText,
        check.threshold ?? DEFAULT_TEXT_THRESHOLD
      );
      break;
    case "cursor":
      result = checkCursor(simulator, check.expected);
      break;
    case "mode":
      result = checkMode(simulator, check.expected);
      break;
    case "commands":
      result = checkCommands(simulator, check.expected);
      break;
  }

  if (check.maxKeystrokes !== undefined) {
    const used = typedKeys(simulator).length;
    if (used > check.maxKeystrokes) {
      return {
        ...result,
        passed: false,
        feedback: `${result.feedback} (used ${used} keystrokes, limit is ${check.maxKeystrokes})`,
      };
    }
  }
  return result;
}
