import type {
  BufferMotion,
  HistoryEntry,
  MotionTarget,
  Position,
} from "./vim-types";
import { SimulatorContractError } from "./vim-errors";
import { resolveMotion, type FindState } from "./vim-motions";

/**
 * Split text into lines the way the editor reads a file: a trailing newline
 * terminates the last line instead of starting an empty one.
 */
export function splitText(text: string): string[] {
  let lines = text.replace(/\r\n/g, "\n").split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") {
    lines = lines.slice(0, -1);
  }
  return lines.length > 0 ? lines : [""];
}

/** Edits that would grow the buffer past this many characters are refused. */
export const MAX_TEXT_CHARS = 2_000_000;

export class TextBuffer {
  private lines: string[];
  private cursorLine = 0;
  private cursorCol = 0;
  private preferredCol = 0;
  private lastFind: FindState | null = null;
  /** Insert and replace mode let the cursor sit after the last character. */
  allowPastEnd = false;

  constructor(text = "") {
    this.lines = splitText(text);
  }

  lineCount(): number {
    return this.lines.length;
  }

  lineLength(n: number): number {
    return this.getLine(n).length;
  }

  getLine(n: number): string {
    this.assertLine(n);
    return this.lines[n];
  }

  getLines(): string[] {
    return [...this.lines];
  }

  /** Live view for read-only helpers (motions, search) that must not copy. */
  view(): readonly string[] {
    return this.lines;
  }

  getText(): string {
    return this.lines.join("\n");
  }

  /** Characters in the buffer, one newline counted per line. */
  textLength(): number {
    let total = 0;
    for (const line of this.lines) total += line.length + 1;
    return total;
  }

  wouldExceed(extraChars: number): boolean {
    return this.textLength() + extraChars > MAX_TEXT_CHARS;
  }

  setText(text: string): void {
    this.lines = splitText(text);
    this.cursorLine = 0;
    this.cursorCol = 0;
    this.preferredCol = 0;
    this.lastFind = null;
  }

  get cursor(): Position {
    return { line: this.cursorLine, col: this.cursorCol };
  }

  getLastFind(): FindState | null {
    return this.lastFind ? { ...this.lastFind } : null;
  }

  setCursor(pos: Position): void {
    this.assertPosition(pos);
    this.cursorLine = pos.line;
    this.cursorCol = pos.col;
    this.clampCursor();
    this.preferredCol = this.cursorCol;
  }

  /** Like `setCursor`, but out-of-range input is clamped instead of rejected. */
  placeCursor(pos: Position): void {
    this.cursorLine = Math.max(0, Math.min(pos.line, this.lines.length - 1));
    this.cursorCol = Math.max(0, pos.col);
    this.clampCursor();
    this.preferredCol = this.cursorCol;
  }

  clampCursor(): void {
    const maxLine = this.lines.length - 1;
    this.cursorLine = Math.max(0, Math.min(this.cursorLine, maxLine));
    const lineLen = this.lines[this.cursorLine].length;
    const maxCol = this.allowPastEnd ? lineLen : Math.max(0, lineLen - 1);
    this.cursorCol = Math.max(0, Math.min(this.cursorCol, maxCol));
  }

  /**
   * Resolve a motion without moving. Find motions (`f`, `t`, ...) remember
   * their character for `;` and `,` even when they fail.
   */
  resolveMotion(
    motion: BufferMotion,
    count: number,
    forOperator = false
  ): MotionTarget | null {
    if (motion.kind === "findChar") {
      this.lastFind = { char: motion.char, direction: motion.direction };
    }
    return resolveMotion(this.lines, this.cursor, motion, count, {
      preferredCol: this.preferredCol,
      lastFind: this.lastFind,
      forOperator,
    });
  }

  /** Returns false when the motion had no effect (a buffer boundary). */
  moveCursor(motion: BufferMotion, count = 1): boolean {
    const target = this.resolveMotion(motion, count);
    if (motion.kind === "lineEnd") {
      this.preferredCol = Number.POSITIVE_INFINITY;
    }
    if (!target) return false;

    const before = this.cursor;
    this.cursorLine = target.pos.line;
    this.cursorCol = target.pos.col;
    this.clampCursor();

    if (motion.kind === "lineEnd") {
      this.preferredCol = Number.POSITIVE_INFINITY;
    } else if (motion.kind !== "up" && motion.kind !== "down") {
      this.preferredCol = this.cursorCol;
    }
    return before.line !== this.cursorLine || before.col !== this.cursorCol;
  }

  /** Inserts `text` (which may contain newlines); returns the position after it. */
  insertAt(pos: Position, text: string): Position {
    this.assertPosition(pos);
    const line = this.lines[pos.line];
    const before = line.slice(0, pos.col);
    const after = line.slice(pos.col);
    const parts = text.split("\n");

    if (parts.length === 1) {
      this.lines[pos.line] = before + text + after;
      this.clampCursor();
      return { line: pos.line, col: pos.col + text.length };
    }

    const inserted = parts.map((part, i) => {
      if (i === 0) return before + part;
      if (i === parts.length - 1) return part + after;
      return part;
    });
    this.lines.splice(pos.line, 1, ...inserted);
    this.clampCursor();
    const lastPart = parts[parts.length - 1];
    return { line: pos.line + parts.length - 1, col: lastPart.length };
  }

  /** Deletes from `start` up to but not including `end`; returns the text. */
  deleteRange(start: Position, end: Position): string {
    this.assertPosition(start);
    this.assertPosition(end);
    if (end.line < start.line || (end.line === start.line && end.col < start.col)) {
      throw new SimulatorContractError("deleteRange end precedes start", {
        start,
        end,
      });
    }

    let deleted: string;
    if (start.line === end.line) {
      const line = this.lines[start.line];
      deleted = line.slice(start.col, end.col);
      this.lines[start.line] = line.slice(0, start.col) + line.slice(end.col);
    } else {
      const first = this.lines[start.line];
      const last = this.lines[end.line];
      deleted = [
        first.slice(start.col),
        ...this.lines.slice(start.line + 1, end.line),
        last.slice(0, end.col),
      ].join("\n");
      this.lines.splice(
        start.line,
        end.line - start.line + 1,
        first.slice(0, start.col) + last.slice(end.col)
      );
    }
    this.clampCursor();
    return deleted;
  }

  insertLines(at: number, newLines: readonly string[]): void {
    if (at < 0 || at > this.lines.length) {
      throw new SimulatorContractError(`insertLines index ${at} out of range`);
    }
    this.lines.splice(at, 0, ...newLines);
    this.clampCursor();
  }

  /** Removes lines `first..last` inclusive; the buffer keeps at least one line. */
  deleteLines(first: number, last: number): string[] {
    this.assertLine(first);
    this.assertLine(last);
    const removed = this.lines.splice(first, last - first + 1);
    if (this.lines.length === 0) this.lines.push("");
    this.clampCursor();
    return removed;
  }

  /** Swaps lines `first..last` for `rows`; the buffer keeps at least one line. */
  replaceLines(first: number, last: number, rows: readonly string[]): string[] {
    this.assertLine(first);
    this.assertLine(last);
    const removed = this.lines.splice(first, last - first + 1, ...rows);
    if (this.lines.length === 0) this.lines.push("");
    this.clampCursor();
    return removed;
  }

  replaceLine(n: number, text: string): void {
    this.assertLine(n);
    this.lines[n] = text;
    this.clampCursor();
  }

  snapshot(): HistoryEntry {
    return { lines: [...this.lines], cursor: this.cursor };
  }

  restore(entry: HistoryEntry): void {
    this.lines = entry.lines.length > 0 ? [...entry.lines] : [""];
    this.cursorLine = entry.cursor.line;
    this.cursorCol = entry.cursor.col;
    this.clampCursor();
    this.preferredCol = this.cursorCol;
  }

  private assertLine(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n >= this.lines.length) {
      throw new SimulatorContractError(
        `line ${n} out of range (buffer has ${this.lines.length} lines)`
      );
    }
  }

  private assertPosition(pos: Position): void {
    this.assertLine(pos.line);
    const len = this.lines[pos.line].length;
    if (!Number.isInteger(pos.col) || pos.col < 0 || pos.col > len) {
      throw new SimulatorContractError(
        `column ${pos.col} out of range on line ${pos.line} (length ${len})`
      );
    }
  }
}
