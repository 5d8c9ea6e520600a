import type {
  Action,
  Motion,
  MotionTarget,
  ParsedCommand,
  Position,
  SearchDirection,
  SearchMotion,
} from "./vim-types";
import type { CommandInterpreter, KeyResult } from "./vim-interpreter";
import { changeWordTarget } from "./vim-motions";
import {
  FAILED,
  OK,
  applyOperator,
  putRegister,
  rangeFromMotion,
  rangeFromTextObject,
  type EditRange,
} from "./vim-operators";
import { getTextObject } from "./vim-text-object";
import { firstNonBlank, leadingWhitespace, toggleCase } from "./vim-utils";

function isSearchMotion(motion: Motion): motion is SearchMotion {
  return (
    motion.kind === "searchNext" ||
    motion.kind === "searchPrevious" ||
    motion.kind === "searchWord"
  );
}

export function wrapMessage(direction: SearchDirection): string {
  return direction === "forward"
    ? "search hit BOTTOM, continuing at TOP"
    : "search hit TOP, continuing at BOTTOM";
}

interface ResolvedTarget {
  target: MotionTarget | null;
  message: string | null;
}

function searchTarget(
  editor: CommandInterpreter,
  motion: SearchMotion,
  count: number
): ResolvedTarget {
  const { search, buffer } = editor;
  const lines = buffer.view();
  const cursor = buffer.cursor;

  let pos: Position | null;
  let direction: SearchDirection;
  let pattern: string;

  if (motion.kind === "searchWord") {
    const found = search.searchWordUnderCursor(lines, cursor, motion.direction, count);
    if (!found) return { target: null, message: "E348: No string under cursor" };
    pos = found.pos;
    pattern = found.pattern;
    direction = motion.direction;
  } else {
    const last = search.lastSearch;
    if (!last) return { target: null, message: "E35: No previous regular expression" };
    pattern = last.pattern;
    if (motion.kind === "searchNext") {
      direction = last.direction;
      pos = search.repeatNext(lines, cursor, count);
    } else {
      direction = last.direction === "forward" ? "backward" : "forward";
      pos = search.repeatPrevious(lines, cursor, count);
    }
  }

  if (!pos) return { target: null, message: `E486: Pattern not found: ${pattern}` };
  return {
    target: { pos, linewise: false, inclusive: false },
    message: search.lastWrapped ? wrapMessage(direction) : null,
  };
}

/** Resolves any motion, search motions included, without moving the cursor. */
export function motionTarget(
  editor: CommandInterpreter,
  motion: Motion,
  count: number,
  forOperator: boolean
): ResolvedTarget {
  if (isSearchMotion(motion)) return searchTarget(editor, motion, count);
  return {
    target: editor.buffer.resolveMotion(motion, count, forOperator),
    message: null,
  };
}

/** A bare motion: moves the cursor, or fails at a boundary. */
export function executeMotion(
  editor: CommandInterpreter,
  motion: Motion,
  count: number
): KeyResult {
  if (!isSearchMotion(motion)) {
    if (!editor.buffer.resolveMotion(motion, count)) return FAILED;
    editor.buffer.moveCursor(motion, count);
    return OK;
  }
  const { target, message } = searchTarget(editor, motion, count);
  if (!target) return { message, failed: true };
  editor.buffer.placeCursor(target.pos);
  return { message, failed: false };
}

/** `J`: joins `count` lines (at least two) starting at `line`. */
export function joinLines(
  editor: CommandInterpreter,
  line: number,
  count: number
): KeyResult {
  const { buffer, history } = editor;
  const lastLine = buffer.lineCount() - 1;
  if (line >= lastLine) return FAILED;
  const last = Math.min(lastLine, line + Math.max(2, count) - 1);

  history.snapshotBeforeChange();
  let text = buffer.getLine(line);
  let col = 0;
  for (let l = line + 1; l <= last; l++) {
    const next = buffer.getLine(l).replace(/^\s+/, "");
    const glue =
      next === "" || text === "" || /\s$/.test(text) || next.startsWith(")") ? "" : " ";
    col = text.length;
    text = text + glue + next;
  }
  buffer.replaceLines(line, last, [text]);
  buffer.placeCursor({ line, col });
  history.discardLastIfUnchanged();
  return OK;
}

/** Opens an empty (or autoindented) line at `at` and returns where typing starts. */
export function openLine(editor: CommandInterpreter, at: number, indentFrom: number): Position {
  const indent = editor.options.autoindent
    ? leadingWhitespace(editor.buffer.getLine(indentFrom))
    : "";
  editor.buffer.insertLines(at, [indent]);
  return { line: at, col: indent.length };
}

function operatorRange(
  editor: CommandInterpreter,
  command: Extract<ParsedCommand, { kind: "operate" }>
): { range: EditRange | null; resolved: boolean; message: string | null; at?: Position } {
  const { buffer } = editor;
  const lines = buffer.view();
  const cursor = buffer.cursor;
  const count = Math.max(1, command.count ?? 1);
  const target = command.target;

  switch (target.kind) {
    case "lines": {
      const last = Math.min(buffer.lineCount() - 1, cursor.line + count - 1);
      return {
        range: { kind: "lines", first: cursor.line, last },
        resolved: true,
        message: null,
      };
    }

    case "textObject": {
      const object = getTextObject(lines, cursor, target.object, count);
      if (!object) return { range: null, resolved: false, message: null };
      return {
        range: rangeFromTextObject(object),
        resolved: true,
        message: null,
        at: object.start,
      };
    }

    case "motion": {
      const motion = target.motion;
      if (
        command.operator === "change" &&
        (motion.kind === "wordForward" || motion.kind === "WORDForward")
      ) {
        const variant = motion.kind === "wordForward" ? "word" : "WORD";
        const word = changeWordTarget(lines, cursor, variant, count);
        if (word) {
          return { range: rangeFromMotion(lines, cursor, word), resolved: true, message: null };
        }
      }
      const resolved = motionTarget(editor, motion, count, true);
      if (!resolved.target) {
        return { range: null, resolved: false, message: resolved.message };
      }
      return {
        range: rangeFromMotion(lines, cursor, resolved.target),
        resolved: true,
        message: resolved.message,
      };
    }

    case "searchPrompt":
    case "selection":
      return { range: null, resolved: false, message: null };
  }
}

function resolveOperate(
  editor: CommandInterpreter,
  command: Extract<ParsedCommand, { kind: "operate" }>
): KeyResult {
  const { buffer, modes, history } = editor;

  if (command.target.kind === "searchPrompt") {
    editor.searchOperator = {
      operator: command.operator,
      count: command.count,
      register: command.register,
    };
    modes.enterCommand(command.target.prompt);
    return OK;
  }

  const { range, resolved, message, at } = operatorRange(editor, command);
  if (!range) {
    // `cw` on an empty line, `ci(` on `()`: nothing to remove, but insert still starts
    if (command.operator === "change" && (resolved || buffer.lineLength(buffer.cursor.line) === 0)) {
      history.snapshotBeforeChange();
      editor.startInsert(at ?? buffer.cursor);
      return { message, failed: false };
    }
    return resolved ? { message, failed: false } : { message, failed: true };
  }

  const result = applyOperator(editor, command.operator, range, {
    register: command.register,
  });
  return { message: result.message ?? message, failed: result.failed };
}

function insertPosition(
  editor: CommandInterpreter,
  entry: Extract<Action, { kind: "insert" }>["entry"],
  resume: boolean
): Position {
  const { buffer } = editor;
  const cursor = buffer.cursor;
  const line = buffer.getLine(cursor.line);

  switch (entry) {
    case "before":
      return resume ? { line: cursor.line, col: line.length } : cursor;
    case "after":
      return { line: cursor.line, col: Math.min(line.length, cursor.col + 1) };
    case "lineStart":
      return { line: cursor.line, col: line.trim() === "" ? line.length : firstNonBlank(line) };
    case "lineEnd":
      return { line: cursor.line, col: line.length };
    case "openBelow":
      return openLine(editor, cursor.line + 1, cursor.line);
    case "openAbove":
      return openLine(editor, cursor.line, cursor.line);
  }
}

function toggleCaseUnderCursor(editor: CommandInterpreter, count: number): KeyResult {
  const { buffer, history } = editor;
  const cursor = buffer.cursor;
  const line = buffer.getLine(cursor.line);
  if (line.length === 0) return OK;

  const end = Math.min(line.length, cursor.col + Math.max(1, count));
  const flipped = toggleCase(line.slice(cursor.col, end));

  history.snapshotBeforeChange();
  buffer.replaceLine(cursor.line, line.slice(0, cursor.col) + flipped + line.slice(end));
  buffer.placeCursor({ line: cursor.line, col: end });
  history.discardLastIfUnchanged();
  return OK;
}

function replaceUnderCursor(editor: CommandInterpreter, char: string, count: number): KeyResult {
  const { buffer, history } = editor;
  const cursor = buffer.cursor;
  const line = buffer.getLine(cursor.line);
  const n = Math.max(1, count);
  if (cursor.col + n > line.length) return FAILED;

  history.snapshotBeforeChange();
  if (char === "\n") {
    buffer.deleteRange(cursor, { line: cursor.line, col: cursor.col + n });
    buffer.insertAt(cursor, "\n");
    buffer.placeCursor({ line: cursor.line + 1, col: 0 });
  } else {
    buffer.replaceLine(
      cursor.line,
      line.slice(0, cursor.col) + char.repeat(n) + line.slice(cursor.col + n)
    );
    buffer.placeCursor({ line: cursor.line, col: cursor.col + n - 1 });
  }
  history.discardLastIfUnchanged();
  return OK;
}

function resolveAction(
  editor: CommandInterpreter,
  action: Action,
  count: number | undefined,
  register: string | undefined,
  resume: boolean
): KeyResult {
  const { buffer, history, modes, macros } = editor;
  const n = Math.max(1, count ?? 1);

  switch (action.kind) {
    case "escape":
      return OK;

    case "put":
      return putRegister(editor, action.before, n, register);

    case "undo":
      return { message: editor.undo(n), failed: false };

    case "redo":
      return { message: editor.redo(n), failed: false };

    case "joinLines":
      return joinLines(editor, buffer.cursor.line, n);

    case "toggleCaseChar":
      return toggleCaseUnderCursor(editor, n);

    case "replaceChar":
      return replaceUnderCursor(editor, action.char, n);

    case "insert": {
      history.snapshotBeforeChange();
      const pos = insertPosition(editor, action.entry, resume);
      editor.startInsert(pos, { count: n, entry: action.entry });
      return OK;
    }

    case "replaceMode":
      history.snapshotBeforeChange();
      editor.startInsert(buffer.cursor, { count: n, replace: true });
      return OK;

    case "visual":
      modes.enterVisual(action.visual, buffer.cursor);
      return OK;

    case "commandLine":
      if (action.prompt === ":") {
        modes.enterCommand(":", count === undefined ? "" : n === 1 ? "." : `.,.+${n - 1}`);
      } else {
        editor.searchCount = count;
        modes.enterCommand(action.prompt);
      }
      return OK;

    case "startRecording":
      macros.startRecording(action.register);
      return OK;

    case "stopRecording": {
      const recorded = macros.stopRecording();
      if (recorded) editor.registers.write(recorded.register, recorded.keys);
      return OK;
    }

    case "playMacro":
      return editor.playMacro(action.register, n);

    case "repeatLastChange":
      return editor.repeatLastChange(count);

    case "swapSelectionEnds":
    case "selectTextObject":
    case "blockInsert":
      return FAILED;
  }
}

/** Runs one complete normal-mode command. */
export function resolveNormalCommand(
  editor: CommandInterpreter,
  command: ParsedCommand,
  resumeAtLineEnd: boolean
): KeyResult {
  switch (command.kind) {
    case "move":
      return executeMotion(editor, command.motion, command.count ?? 1);
    case "operate":
      return resolveOperate(editor, command);
    case "action":
      return resolveAction(
        editor,
        command.action,
        command.count,
        command.register,
        resumeAtLineEnd
      );
  }
}
