import type {
  Action,
  BufferMotion,
  FindDirection,
  Motion,
  OpenBracket,
  Operator,
  OperatorTarget,
  ParsedCommand,
  QuoteChar,
  TextObject,
} from "./vim-types";
import { isSpecialKey } from "./vim-keys";
import { isValidRegister } from "./vim-registers";

/** Keys of the command being typed, broken into its grammar slots. */
export interface PendingCommand {
  count?: number;
  register?: string;
  operator?: Operator;
  operatorCount?: number;
  keys: string[];
}

export interface ParserContext {
  visual: boolean;
  recording: boolean;
}

export type ParseResult =
  | { status: "pending"; pending: PendingCommand }
  | { status: "complete"; command: ParsedCommand }
  /** A null message means the command was cancelled quietly. */
  | { status: "invalid"; message: string | null };

type Step<T> =
  | { kind: "ok"; value: T; next: number }
  | { kind: "pending" }
  | { kind: "invalid"; message?: string | null };

const PENDING = { kind: "pending" } as const;
const INVALID = { kind: "invalid" } as const;

const SIMPLE_MOTIONS: Record<string, Motion> = {
  h: { kind: "left" },
  "<Left>": { kind: "left" },
  "<BS>": { kind: "left" },
  l: { kind: "right" },
  "<Right>": { kind: "right" },
  " ": { kind: "right" },
  j: { kind: "down" },
  "<Down>": { kind: "down" },
  "<C-n>": { kind: "down" },
  k: { kind: "up" },
  "<Up>": { kind: "up" },
  "<C-p>": { kind: "up" },
  w: { kind: "wordForward" },
  W: { kind: "WORDForward" },
  b: { kind: "wordBack" },
  B: { kind: "WORDBack" },
  e: { kind: "wordEnd" },
  E: { kind: "WORDEnd" },
  "0": { kind: "lineStart" },
  "^": { kind: "lineFirstNonBlank" },
  $: { kind: "lineEnd" },
  G: { kind: "fileEnd" },
  ";": { kind: "repeatFind" },
  ",": { kind: "repeatFindReverse" },
  "}": { kind: "paragraphForward" },
  "{": { kind: "paragraphBack" },
  "%": { kind: "matchPair" },
  n: { kind: "searchNext" },
  N: { kind: "searchPrevious" },
  "*": { kind: "searchWord", direction: "forward" },
  "#": { kind: "searchWord", direction: "backward" },
};

const G_MOTIONS: Record<string, Motion> = {
  g: { kind: "fileStart" },
  _: { kind: "lineLastNonBlank" },
};

const OPERATORS: Record<string, Operator> = {
  d: "delete",
  y: "yank",
  c: "change",
  ">": "indent",
  "<": "outdent",
};

const G_OPERATORS: Record<string, Operator> = {
  u: "lowercase",
  U: "uppercase",
  "~": "toggleCase",
};

const QUOTES: Record<string, QuoteChar> = { '"': '"', "'": "'", "`": "`" };

const BRACKETS: Record<string, OpenBracket> = {
  "(": "(",
  ")": "(",
  b: "(",
  "[": "[",
  "]": "[",
  "{": "{",
  "}": "{",
  B: "{",
  "<": "<",
  ">": "<",
};

const INSERT_KEYS: Record<string, Action> = {
  i: { kind: "insert", entry: "before" },
  a: { kind: "insert", entry: "after" },
  I: { kind: "insert", entry: "lineStart" },
  A: { kind: "insert", entry: "lineEnd" },
  o: { kind: "insert", entry: "openBelow" },
  O: { kind: "insert", entry: "openAbove" },
};

const NORMAL_ACTIONS: Record<string, Action> = {
  ...INSERT_KEYS,
  "<Esc>": { kind: "escape" },
  p: { kind: "put", before: false },
  P: { kind: "put", before: true },
  u: { kind: "undo" },
  "<C-r>": { kind: "redo" },
  J: { kind: "joinLines" },
  "~": { kind: "toggleCaseChar" },
  R: { kind: "replaceMode" },
  v: { kind: "visual", visual: "char" },
  V: { kind: "visual", visual: "line" },
  "<C-v>": { kind: "visual", visual: "block" },
  ":": { kind: "commandLine", prompt: ":" },
  "/": { kind: "commandLine", prompt: "/" },
  "?": { kind: "commandLine", prompt: "?" },
  ".": { kind: "repeatLastChange" },
};

const VISUAL_ACTIONS: Record<string, Action> = {
  "<Esc>": { kind: "escape" },
  p: { kind: "put", before: false },
  P: { kind: "put", before: true },
  J: { kind: "joinLines" },
  o: { kind: "swapSelectionEnds" },
  O: { kind: "swapSelectionEnds" },
  v: { kind: "visual", visual: "char" },
  V: { kind: "visual", visual: "line" },
  "<C-v>": { kind: "visual", visual: "block" },
  ":": { kind: "commandLine", prompt: ":" },
  "/": { kind: "commandLine", prompt: "/" },
  "?": { kind: "commandLine", prompt: "?" },
  I: { kind: "blockInsert", append: false },
  A: { kind: "blockInsert", append: true },
};

/** Normal-mode shorthands for an operator applied to a fixed motion. */
const NORMAL_SHORTHANDS: Record<
  string,
  { operator: Operator; motion: BufferMotion | null }
> = {
  x: { operator: "delete", motion: { kind: "right" } },
  "<Del>": { operator: "delete", motion: { kind: "right" } },
  X: { operator: "delete", motion: { kind: "left" } },
  D: { operator: "delete", motion: { kind: "lineEnd" } },
  C: { operator: "change", motion: { kind: "lineEnd" } },
  s: { operator: "change", motion: { kind: "right" } },
  S: { operator: "change", motion: null },
  Y: { operator: "yank", motion: null },
};

/** Visual-mode keys that apply an operator to the selection. */
const VISUAL_OPERATORS: Record<string, { operator: Operator; linewise: boolean }> = {
  d: { operator: "delete", linewise: false },
  x: { operator: "delete", linewise: false },
  "<Del>": { operator: "delete", linewise: false },
  X: { operator: "delete", linewise: true },
  D: { operator: "delete", linewise: true },
  y: { operator: "yank", linewise: false },
  Y: { operator: "yank", linewise: true },
  c: { operator: "change", linewise: false },
  s: { operator: "change", linewise: false },
  C: { operator: "change", linewise: true },
  S: { operator: "change", linewise: true },
  R: { operator: "change", linewise: true },
  ">": { operator: "indent", linewise: true },
  "<": { operator: "outdent", linewise: true },
  u: { operator: "lowercase", linewise: false },
  U: { operator: "uppercase", linewise: false },
  "~": { operator: "toggleCase", linewise: false },
};

function readCount(keys: readonly string[], start: number): { count?: number; next: number } {
  let i = start;
  let digits = "";
  while (i < keys.length && /^[0-9]$/.test(keys[i]) && !(digits === "" && keys[i] === "0")) {
    digits += keys[i];
    i++;
  }
  return digits ? { count: parseInt(digits, 10), next: i } : { next: start };
}

/** A key usable as the argument of `f`, `t`, `r` and friends. */
function charArgument(key: string): string | null {
  if (key === "<Tab>") return "\t";
  if (isSpecialKey(key)) return null;
  return key;
}

function parseMotion(keys: readonly string[], i: number): Step<Motion> {
  const key = keys[i];
  if (key === undefined) return PENDING;

  const simple = SIMPLE_MOTIONS[key];
  if (simple) return { kind: "ok", value: simple, next: i + 1 };

  if (key === "f" || key === "F" || key === "t" || key === "T") {
    const arg = keys[i + 1];
    if (arg === undefined) return PENDING;
    const char = charArgument(arg);
    if (char === null) return INVALID;
    const direction: FindDirection = key;
    return { kind: "ok", value: { kind: "findChar", char, direction }, next: i + 2 };
  }

  if (key === "g") {
    const next = keys[i + 1];
    if (next === undefined) return PENDING;
    const motion = G_MOTIONS[next];
    if (motion) return { kind: "ok", value: motion, next: i + 2 };
  }

  return INVALID;
}

function parseTextObject(keys: readonly string[], i: number): Step<TextObject> {
  const modifier = keys[i];
  if (modifier !== "i" && modifier !== "a") return INVALID;
  const key = keys[i + 1];
  if (key === undefined) return PENDING;
  const around = modifier === "a";
  const next = i + 2;

  if (key === "w") return { kind: "ok", value: { kind: "word", around }, next };
  if (key === "W") return { kind: "ok", value: { kind: "WORD", around }, next };
  if (key === "p") return { kind: "ok", value: { kind: "paragraph", around }, next };
  const quote = QUOTES[key];
  if (quote) return { kind: "ok", value: { kind: "quote", around, quote }, next };
  const open = BRACKETS[key];
  if (open) return { kind: "ok", value: { kind: "bracket", around, open }, next };
  return INVALID;
}

function multiply(a?: number, b?: number): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return a * b;
}

/** `G` and `gg` take their count as a line number. */
function withLineCount(motion: Motion, count: number | undefined): {
  motion: Motion;
  count?: number;
} {
  if ((motion.kind === "fileEnd" || motion.kind === "fileStart") && count !== undefined) {
    return { motion: { kind: "toLine", line: count - 1 } };
  }
  return { motion, count };
}

function parseOperatorTarget(
  keys: readonly string[],
  start: number,
  operatorKeys: readonly string[]
): Step<{ target: OperatorTarget; count?: number }> {
  const { count, next: i } = readCount(keys, start);
  const key = keys[i];
  if (key === undefined) return PENDING;

  // dd, yy, cc, >>, <<, guu / gugu, gUU / gUgU, g~~ / g~g~
  const last = operatorKeys[operatorKeys.length - 1];
  if (key === last) {
    return { kind: "ok", value: { target: { kind: "lines" }, count }, next: i + 1 };
  }
  if (operatorKeys.length === 2 && key === "g") {
    const second = keys[i + 1];
    if (second === undefined) return PENDING;
    if (second === last) {
      return { kind: "ok", value: { target: { kind: "lines" }, count }, next: i + 2 };
    }
  }

  if (key === "/" || key === "?") {
    return { kind: "ok", value: { target: { kind: "searchPrompt", prompt: key }, count }, next: i + 1 };
  }

  if (key === "i" || key === "a") {
    const object = parseTextObject(keys, i);
    if (object.kind !== "ok") return object;
    return {
      kind: "ok",
      value: { target: { kind: "textObject", object: object.value }, count },
      next: object.next,
    };
  }

  const motion = parseMotion(keys, i);
  if (motion.kind !== "ok") return motion;
  return {
    kind: "ok",
    value: { target: { kind: "motion", motion: motion.value }, count },
    next: motion.next,
  };
}

function complete(command: ParsedCommand): ParseResult {
  return { status: "complete", command };
}

function invalid(keys: readonly string[], message?: string | null): ParseResult {
  return {
    status: "invalid",
    message: message === undefined ? `Not an editor command: ${keys.join("")}` : message,
  };
}

function pending(pendingCommand: PendingCommand): ParseResult {
  return { status: "pending", pending: pendingCommand };
}

/**
 * Parses the keys typed so far in normal or visual mode:
 * `[count]["x][operator][count](motion|text object|command)`.
 */
export function parseCommand(keys: readonly string[], context: ParserContext): ParseResult {
  const pendingState: PendingCommand = { keys: [...keys] };
  if (keys.length > 1 && keys[keys.length - 1] === "<Esc>") {
    return invalid(keys, null);
  }

  let { count, next: i } = readCount(keys, 0);
  pendingState.count = count;

  let register: string | undefined;
  if (keys[i] === '"') {
    const name = keys[i + 1];
    if (name === undefined) return pending(pendingState);
    if (!isValidRegister(name)) {
      return invalid(keys, `E354: Invalid register name: ${name}`);
    }
    register = name;
    pendingState.register = name;
    i += 2;
    const more = readCount(keys, i);
    count = multiply(count, more.count);
    pendingState.count = count;
    i = more.next;
  }

  const key = keys[i];
  if (key === undefined) return pending(pendingState);

  if (context.visual) {
    return parseVisual(keys, i, count, register, pendingState);
  }

  // Operators
  let operator: Operator | undefined = OPERATORS[key];
  let operatorKeys = [key];
  if (!operator && key === "g") {
    const second = keys[i + 1];
    if (second === undefined) return pending(pendingState);
    operator = G_OPERATORS[second];
    operatorKeys = [key, second];
  }
  if (operator) {
    pendingState.operator = operator;
    const target = parseOperatorTarget(keys, i + operatorKeys.length, operatorKeys);
    if (target.kind === "pending") {
      pendingState.operatorCount = readCount(keys, i + operatorKeys.length).count;
      return pending(pendingState);
    }
    if (target.kind === "invalid") return invalid(keys, target.message);
    const total = multiply(count, target.value.count);
    const resolved =
      target.value.target.kind === "motion"
        ? withLineCount(target.value.target.motion, total)
        : null;
    return complete({
      kind: "operate",
      operator,
      target: resolved ? { kind: "motion", motion: resolved.motion } : target.value.target,
      count: resolved ? resolved.count : total,
      register,
    });
  }

  const shorthand = NORMAL_SHORTHANDS[key];
  if (shorthand) {
    return complete({
      kind: "operate",
      operator: shorthand.operator,
      target: shorthand.motion ? { kind: "motion", motion: shorthand.motion } : { kind: "lines" },
      count,
      register,
    });
  }

  if (key === "r") {
    const arg = keys[i + 1];
    if (arg === undefined) return pending(pendingState);
    const char = arg === "<CR>" ? "\n" : charArgument(arg);
    if (char === null) return invalid(keys);
    return complete({ kind: "action", action: { kind: "replaceChar", char }, count });
  }

  if (key === "q") {
    if (context.recording) {
      return complete({ kind: "action", action: { kind: "stopRecording" } });
    }
    const name = keys[i + 1];
    if (name === undefined) return pending(pendingState);
    if (!/^[a-zA-Z0-9"]$/.test(name)) return invalid(keys);
    return complete({ kind: "action", action: { kind: "startRecording", register: name } });
  }

  if (key === "@") {
    const name = keys[i + 1];
    if (name === undefined) return pending(pendingState);
    if (!/^[a-zA-Z0-9"@:]$/.test(name)) return invalid(keys);
    return complete({ kind: "action", action: { kind: "playMacro", register: name }, count });
  }

  const action = NORMAL_ACTIONS[key];
  if (action) return complete({ kind: "action", action, count, register });

  const motion = parseMotion(keys, i);
  if (motion.kind === "pending") return pending(pendingState);
  if (motion.kind === "invalid") return invalid(keys);
  const resolved = withLineCount(motion.value, count);
  return complete({ kind: "move", motion: resolved.motion, count: resolved.count });
}

function parseVisual(
  keys: readonly string[],
  i: number,
  count: number | undefined,
  register: string | undefined,
  pendingState: PendingCommand
): ParseResult {
  const key = keys[i];

  if (key === "g") {
    const second = keys[i + 1];
    if (second === undefined) return pending(pendingState);
    const operator = G_OPERATORS[second];
    if (operator) {
      return complete({
        kind: "operate",
        operator,
        target: { kind: "selection", forceLinewise: false },
        count,
        register,
      });
    }
  }

  const visualOperator = VISUAL_OPERATORS[key];
  if (visualOperator) {
    return complete({
      kind: "operate",
      operator: visualOperator.operator,
      target: { kind: "selection", forceLinewise: visualOperator.linewise },
      count,
      register,
    });
  }

  if (key === "r") {
    const arg = keys[i + 1];
    if (arg === undefined) return pending(pendingState);
    const char = charArgument(arg);
    if (char === null) return invalid(keys);
    return complete({ kind: "action", action: { kind: "replaceChar", char } });
  }

  if (key === "i" || key === "a") {
    const object = parseTextObject(keys, i);
    if (object.kind === "pending") return pending(pendingState);
    if (object.kind === "invalid") return invalid(keys);
    return complete({
      kind: "action",
      action: { kind: "selectTextObject", object: object.value },
      count,
    });
  }

  const action = VISUAL_ACTIONS[key];
  if (action) return complete({ kind: "action", action, count, register });

  const motion = parseMotion(keys, i);
  if (motion.kind === "pending") return pending(pendingState);
  if (motion.kind === "invalid") return invalid(keys);
  const resolved = withLineCount(motion.value, count);
  return complete({ kind: "move", motion: resolved.motion, count: resolved.count });
}
