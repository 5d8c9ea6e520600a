import type {
  MotionTarget,
  Operator,
  Position,
  RegisterEntry,
  TextRange,
} from "./vim-types";
import type { CommandInterpreter, KeyResult } from "./vim-interpreter";
import {
  firstNonBlank,
  leadingWhitespace,
  orderPositions,
  toggleCase,
} from "./vim-utils";
import { isEmptyRange } from "./vim-text-object";
import { MAX_TEXT_CHARS } from "./vim-buffer";

/** End is exclusive for `chars`; `block` columns are inclusive. */
export type EditRange =
  | { kind: "chars"; start: Position; end: Position }
  | { kind: "lines"; first: number; last: number }
  | { kind: "block"; top: number; bottom: number; left: number; right: number };

export const OK: KeyResult = { message: null, failed: false };
export const FAILED: KeyResult = { message: null, failed: true };

/** Refusal for an edit that would grow the buffer past MAX_TEXT_CHARS. */
export function textTooLong(): KeyResult {
  console.warn(`[VimEngine] Aborting: text would exceed ${MAX_TEXT_CHARS} characters`);
  return { message: "E1240: Resulting text too long", failed: true };
}

function samePosition(a: Position, b: Position): boolean {
  return a.line === b.line && a.col === b.col;
}

/** Range an operator covers when its target is a resolved motion. */
export function rangeFromMotion(
  lines: readonly string[],
  cursor: Position,
  target: MotionTarget
): EditRange | null {
  if (target.linewise) {
    return {
      kind: "lines",
      first: Math.min(cursor.line, target.pos.line),
      last: Math.max(cursor.line, target.pos.line),
    };
  }

  const [start, rawEnd] = orderPositions(cursor, target.pos);
  let end = rawEnd;
  if (target.inclusive) {
    end = {
      line: end.line,
      col: Math.min(end.col + 1, lines[end.line].length),
    };
  } else if (end.line > start.line && end.col === 0) {
    // Exclusive motion ending at column 0: stop at the previous line's end
    const previous = end.line - 1;
    if (start.col <= firstNonBlank(lines[start.line])) {
      return { kind: "lines", first: start.line, last: previous };
    }
    end = { line: previous, col: lines[previous].length };
  }

  if (samePosition(start, end)) return null;
  return { kind: "chars", start, end };
}

/** Converts an inclusive text-object range; null for an empty inner object. */
export function rangeFromTextObject(range: TextRange): EditRange | null {
  if (range.linewise) {
    return { kind: "lines", first: range.start.line, last: range.end.line };
  }
  if (isEmptyRange(range)) return null;
  return {
    kind: "chars",
    start: range.start,
    end: { line: range.end.line, col: range.end.col + 1 },
  };
}

export function rangeText(
  lines: readonly string[],
  range: EditRange
): RegisterEntry {
  switch (range.kind) {
    case "lines":
      return {
        text: lines.slice(range.first, range.last + 1).join("\n"),
        linewise: true,
      };
    case "block": {
      const rows: string[] = [];
      for (let l = range.top; l <= range.bottom; l++) {
        rows.push(lines[l].slice(range.left, range.right + 1));
      }
      return { text: rows.join("\n"), linewise: false };
    }
    case "chars": {
      const { start, end } = range;
      if (start.line === end.line) {
        return {
          text: lines[start.line].slice(start.col, end.col),
          linewise: false,
        };
      }
      const parts = [lines[start.line].slice(start.col)];
      for (let l = start.line + 1; l < end.line; l++) parts.push(lines[l]);
      parts.push(lines[end.line].slice(0, end.col));
      return { text: parts.join("\n"), linewise: false };
    }
  }
}

export function rangeLines(range: EditRange): { first: number; last: number } {
  switch (range.kind) {
    case "lines":
      return range;
    case "block":
      return { first: range.top, last: range.bottom };
    case "chars":
      return { first: range.start.line, last: range.end.line };
  }
}

function rangeStart(range: EditRange): Position {
  switch (range.kind) {
    case "lines":
      return { line: range.first, col: 0 };
    case "block":
      return { line: range.top, col: range.left };
    case "chars":
      return range.start;
  }
}

function caseFunction(operator: Operator): (text: string) => string {
  if (operator === "lowercase") return (text) => text.toLowerCase();
  if (operator === "uppercase") return (text) => text.toUpperCase();
  return toggleCase;
}

/** Rewrites the characters a range covers, line by line. */
function mapRange(
  editor: CommandInterpreter,
  range: EditRange,
  fn: (text: string) => string
): void {
  const buffer = editor.buffer;
  const { first, last } = rangeLines(range);
  for (let l = first; l <= last; l++) {
    const line = buffer.getLine(l);
    let from = 0;
    let to = line.length;
    if (range.kind === "block") {
      from = range.left;
      to = range.right + 1;
    } else if (range.kind === "chars") {
      if (l === range.start.line) from = range.start.col;
      if (l === range.end.line) to = range.end.col;
    }
    if (from >= line.length) continue;
    buffer.replaceLine(l, line.slice(0, from) + fn(line.slice(from, to)) + line.slice(to));
  }
}

function shiftLine(line: string, width: number, indent: boolean, tabWidth: number): string {
  if (line.length === 0) return line;
  if (indent) return " ".repeat(width) + line;

  let removed = 0;
  let i = 0;
  while (i < line.length && removed < width) {
    if (line[i] === " ") removed += 1;
    else if (line[i] === "\t") removed += tabWidth;
    else break;
    i++;
  }
  return line.slice(i);
}

function deleteRangeText(editor: CommandInterpreter, range: EditRange): void {
  const buffer = editor.buffer;
  switch (range.kind) {
    case "chars":
      buffer.deleteRange(range.start, range.end);
      return;
    case "lines":
      buffer.deleteLines(range.first, range.last);
      return;
    case "block":
      for (let l = range.top; l <= range.bottom; l++) {
        const line = buffer.getLine(l);
        if (line.length > range.left) {
          buffer.replaceLine(l, line.slice(0, range.left) + line.slice(range.right + 1));
        }
      }
  }
}

export interface OperatorOptions {
  register?: string;
  /** Shift levels for `>`/`<`. */
  levels?: number;
}

/** Applies `operator` to an already-resolved range. */
export function applyOperator(
  editor: CommandInterpreter,
  operator: Operator,
  range: EditRange,
  options: OperatorOptions = {}
): KeyResult {
  const { buffer, registers, history } = editor;
  const report = editor.options.report;
  const entry = rangeText(buffer.view(), range);
  const { first, last } = rangeLines(range);
  const lineCount = last - first + 1;

  switch (operator) {
    case "yank": {
      registers.yank(entry.text, options.register, entry.linewise);
      const start = rangeStart(range);
      buffer.placeCursor(
        range.kind === "lines"
          ? { line: first, col: first === buffer.cursor.line ? buffer.cursor.col : 0 }
          : start
      );
      if (range.kind === "block" && lineCount > report) {
        return { message: `block of ${lineCount} lines yanked`, failed: false };
      }
      return {
        message: entry.linewise && lineCount > report ? `${lineCount} lines yanked` : null,
        failed: false,
      };
    }

    case "delete": {
      history.snapshotBeforeChange();
      registers.delete(entry.text, options.register, entry.linewise);
      deleteRangeText(editor, range);
      if (range.kind === "lines") {
        const line = Math.min(first, buffer.lineCount() - 1);
        buffer.placeCursor({ line, col: firstNonBlank(buffer.getLine(line)) });
      } else {
        buffer.placeCursor(rangeStart(range));
      }
      history.discardLastIfUnchanged();
      return {
        message: range.kind === "lines" && lineCount > report ? `${lineCount} fewer lines` : null,
        failed: false,
      };
    }

    case "change": {
      history.snapshotBeforeChange();
      registers.delete(entry.text, options.register, entry.linewise);
      if (range.kind === "lines") {
        const indent = editor.options.autoindent
          ? leadingWhitespace(buffer.getLine(first))
          : "";
        if (last > first) buffer.deleteLines(first + 1, last);
        buffer.replaceLine(first, indent);
        editor.startInsert({ line: first, col: indent.length });
        return OK;
      }
      deleteRangeText(editor, range);
      if (range.kind === "block") {
        editor.startInsert(
          { line: range.top, col: range.left },
          { block: { top: range.top, bottom: range.bottom, col: range.left, append: false } }
        );
        return OK;
      }
      editor.startInsert(range.start);
      return OK;
    }

    case "indent":
    case "outdent": {
      const levels = Math.max(1, options.levels ?? 1);
      const width = editor.options.shiftwidth * levels;
      if (operator === "indent" && buffer.wouldExceed(width * lineCount)) return textTooLong();
      history.snapshotBeforeChange();
      for (let l = first; l <= last; l++) {
        buffer.replaceLine(
          l,
          shiftLine(buffer.getLine(l), width, operator === "indent", editor.options.shiftwidth)
        );
      }
      buffer.placeCursor({ line: first, col: firstNonBlank(buffer.getLine(first)) });
      history.discardLastIfUnchanged();
      if (lineCount > report) {
        const sign = operator === "indent" ? ">" : "<";
        return {
          message: `${lineCount} lines ${sign}ed ${levels} time${levels === 1 ? "" : "s"}`,
          failed: false,
        };
      }
      return OK;
    }

    case "lowercase":
    case "uppercase":
    case "toggleCase": {
      history.snapshotBeforeChange();
      mapRange(editor, range, caseFunction(operator));
      const cursor = buffer.cursor;
      buffer.placeCursor(
        range.kind === "lines"
          ? { line: first, col: cursor.line === first ? cursor.col : 0 }
          : rangeStart(range)
      );
      history.discardLastIfUnchanged();
      return {
        message: lineCount > report ? `${lineCount} lines changed` : null,
        failed: false,
      };
    }
  }
}

/** `p` / `P` in normal mode. */
export function putRegister(
  editor: CommandInterpreter,
  before: boolean,
  count: number,
  register: string | undefined
): KeyResult {
  const name = register ?? '"';
  const entry = editor.registers.read(name);
  if (!entry || (entry.text.length === 0 && !entry.linewise)) {
    return { message: `E353: Nothing in register ${name}`, failed: true };
  }

  const { buffer, history } = editor;
  const cursor = buffer.cursor;
  const times = Math.max(1, count);
  if (buffer.wouldExceed((entry.text.length + (entry.linewise ? 1 : 0)) * times)) {
    return textTooLong();
  }
  history.snapshotBeforeChange();

  if (entry.linewise) {
    const rows = entry.text.split("\n");
    const lines: string[] = [];
    for (let i = 0; i < times; i++) lines.push(...rows);
    const at = before ? cursor.line : cursor.line + 1;
    buffer.insertLines(at, lines);
    buffer.placeCursor({ line: at, col: firstNonBlank(buffer.getLine(at)) });
    return {
      message: lines.length > editor.options.report ? `${lines.length} more lines` : null,
      failed: false,
    };
  }

  const text = entry.text.repeat(times);
  const lineLength = buffer.lineLength(cursor.line);
  const col = before || lineLength === 0 ? cursor.col : cursor.col + 1;
  const pos = { line: cursor.line, col: Math.min(col, lineLength) };
  const end = buffer.insertAt(pos, text);
  if (text.includes("\n")) {
    buffer.placeCursor(pos);
  } else {
    buffer.placeCursor({ line: end.line, col: Math.max(0, end.col - 1) });
  }
  return OK;
}

/** Puts register text where a deleted charwise selection was. */
export function insertEntryAt(
  editor: CommandInterpreter,
  entry: RegisterEntry,
  pos: Position
): void {
  const buffer = editor.buffer;
  if (entry.linewise) {
    // split the line and put the rows between its halves
    buffer.insertAt(pos, "\n");
    buffer.insertLines(pos.line + 1, entry.text.split("\n"));
    buffer.placeCursor({ line: pos.line + 1, col: 0 });
    return;
  }
  const end = buffer.insertAt(pos, entry.text);
  buffer.placeCursor({ line: end.line, col: Math.max(0, end.col - 1) });
}
