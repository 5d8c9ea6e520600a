import type { Action, ParsedCommand, Position, Selection } from "./vim-types";
import type { CommandInterpreter, KeyResult } from "./vim-interpreter";
import {
  FAILED,
  OK,
  applyOperator,
  insertEntryAt,
  rangeLines,
  rangeText,
  type EditRange,
} from "./vim-operators";
import { getTextObject } from "./vim-text-object";
import { executeMotion, joinLines } from "./vim-mode-normal";

/** The selection as an operator range; `forceLinewise` is `X`, `D`, `S`... */
export function selectionRange(
  lines: readonly string[],
  selection: Selection,
  forceLinewise = false
): EditRange {
  const { start, end } = selection;
  if (selection.kind === "line" || forceLinewise) {
    return { kind: "lines", first: start.line, last: end.line };
  }
  if (selection.kind === "block") {
    return {
      kind: "block",
      top: start.line,
      bottom: end.line,
      left: Math.min(start.col, end.col),
      right: Math.max(start.col, end.col),
    };
  }
  return {
    kind: "chars",
    start,
    end: { line: end.line, col: Math.min(end.col + 1, lines[end.line].length) },
  };
}

function isEmptyChars(range: EditRange): boolean {
  return (
    range.kind === "chars" &&
    range.start.line === range.end.line &&
    range.start.col === range.end.col
  );
}

/** `p` over a selection: the selection goes to the registers, the text takes its place. */
function putOverSelection(
  editor: CommandInterpreter,
  selection: Selection,
  register: string | undefined
): KeyResult {
  const { buffer, registers, history } = editor;
  const name = register ?? '"';
  const entry = registers.read(name);
  if (!entry) return { message: `E353: Nothing in register ${name}`, failed: true };

  const range = selectionRange(buffer.view(), selection);
  const removed = rangeText(buffer.view(), range);
  editor.leaveVisual();
  history.snapshotBeforeChange();
  registers.delete(removed.text, undefined, removed.linewise);

  switch (range.kind) {
    case "lines": {
      const rows = entry.text.split("\n");
      buffer.replaceLines(range.first, range.last, rows);
      buffer.placeCursor({ line: range.first, col: 0 });
      break;
    }
    case "chars":
      if (!isEmptyChars(range)) buffer.deleteRange(range.start, range.end);
      insertEntryAt(editor, entry, range.start);
      break;
    case "block": {
      for (let l = range.top; l <= range.bottom; l++) {
        const line = buffer.getLine(l);
        buffer.replaceLine(l, line.slice(0, range.left) + line.slice(range.right + 1));
      }
      const at = { line: range.top, col: Math.min(range.left, buffer.lineLength(range.top)) };
      insertEntryAt(editor, entry, at);
      break;
    }
  }
  history.discardLastIfUnchanged();
  return OK;
}

function replaceSelection(
  editor: CommandInterpreter,
  selection: Selection,
  char: string
): KeyResult {
  const { buffer, history } = editor;
  const range = selectionRange(buffer.view(), selection);
  editor.leaveVisual();
  history.snapshotBeforeChange();

  const { first, last } = rangeLines(range);
  for (let l = first; l <= last; l++) {
    const line = buffer.getLine(l);
    let from = 0;
    let to = line.length;
    if (range.kind === "block") {
      from = range.left;
      to = Math.min(line.length, range.right + 1);
    } else if (range.kind === "chars") {
      if (l === range.start.line) from = range.start.col;
      if (l === range.end.line) to = range.end.col;
    }
    if (from >= to) continue;
    buffer.replaceLine(l, line.slice(0, from) + char.repeat(to - from) + line.slice(to));
  }

  buffer.placeCursor(
    range.kind === "chars"
      ? range.start
      : { line: first, col: range.kind === "block" ? range.left : 0 }
  );
  history.discardLastIfUnchanged();
  return OK;
}

/** `I` / `A` on a selection; in block mode the text lands on every line. */
function insertOnSelection(
  editor: CommandInterpreter,
  selection: Selection,
  append: boolean
): KeyResult {
  const { buffer, history } = editor;
  editor.leaveVisual();
  history.snapshotBeforeChange();

  if (selection.kind === "line") {
    const line = append ? selection.end.line : selection.start.line;
    editor.startInsert({ line, col: append ? buffer.lineLength(line) : 0 });
    return OK;
  }
  if (selection.kind === "char") {
    const { end } = selection;
    const pos: Position = append
      ? { line: end.line, col: Math.min(end.col + 1, buffer.lineLength(end.line)) }
      : selection.start;
    editor.startInsert(pos);
    return OK;
  }

  const left = Math.min(selection.start.col, selection.end.col);
  const right = Math.max(selection.start.col, selection.end.col);
  const col = append ? right + 1 : left;
  const top = selection.start.line;
  if (append && buffer.lineLength(top) < col) {
    buffer.replaceLine(top, buffer.getLine(top).padEnd(col, " "));
  }
  editor.startInsert(
    { line: top, col },
    { block: { top, bottom: selection.end.line, col, append } }
  );
  return OK;
}

function selectTextObject(
  editor: CommandInterpreter,
  action: Extract<Action, { kind: "selectTextObject" }>,
  count: number
): KeyResult {
  const { buffer, modes } = editor;
  const range = getTextObject(buffer.view(), buffer.cursor, action.object, count);
  if (!range) return FAILED;

  const kind = range.linewise ? "line" : modes.visualKind === "line" ? "char" : undefined;
  modes.reanchor(range.start, kind);
  buffer.placeCursor(range.end);
  return OK;
}

function resolveVisualAction(
  editor: CommandInterpreter,
  action: Action,
  selection: Selection,
  count: number | undefined,
  register: string | undefined
): KeyResult {
  const { buffer, modes } = editor;

  switch (action.kind) {
    case "escape":
      editor.leaveVisual();
      return OK;

    case "visual":
      if (action.visual === modes.visualKind) {
        editor.leaveVisual();
      } else {
        modes.enterVisual(action.visual, buffer.cursor);
      }
      return OK;

    case "swapSelectionEnds": {
      const anchor = modes.swapAnchor(buffer.cursor);
      if (anchor) buffer.placeCursor(anchor);
      return OK;
    }

    case "put":
      return putOverSelection(editor, selection, register);

    case "joinLines": {
      editor.leaveVisual();
      const lines = selection.end.line - selection.start.line + 1;
      return joinLines(editor, selection.start.line, Math.max(2, lines));
    }

    case "replaceChar":
      return replaceSelection(editor, selection, action.char);

    case "blockInsert":
      return insertOnSelection(editor, selection, action.append);

    case "selectTextObject":
      return selectTextObject(editor, action, Math.max(1, count ?? 1));

    case "commandLine":
      if (action.prompt === ":") {
        editor.saveSelection();
        modes.toNormal();
        buffer.clampCursor();
        modes.enterCommand(":", "'<,'>");
      } else {
        editor.searchCount = count;
        modes.enterCommand(action.prompt);
      }
      return OK;

    default:
      return FAILED;
  }
}

/** Runs one complete visual-mode command. */
export function resolveVisualCommand(
  editor: CommandInterpreter,
  command: ParsedCommand
): KeyResult {
  const selection = editor.selection();
  if (!selection) return FAILED;

  switch (command.kind) {
    case "move":
      return executeMotion(editor, command.motion, command.count ?? 1);

    case "operate": {
      if (command.target.kind !== "selection") return FAILED;
      const range = selectionRange(
        editor.buffer.view(),
        selection,
        command.target.forceLinewise
      );
      editor.leaveVisual();
      if (isEmptyChars(range)) {
        // an empty line selected charwise
        if (command.operator === "change") {
          editor.history.snapshotBeforeChange();
          editor.startInsert(selection.start);
        }
        return OK;
      }
      return applyOperator(editor, command.operator, range, {
        register: command.register,
        levels: command.count,
      });
    }

    case "action":
      return resolveVisualAction(
        editor,
        command.action,
        selection,
        command.count,
        command.register
      );
  }
}
