import type {
  BufferMotion,
  FindDirection,
  MotionTarget,
  Position,
} from "./vim-types";
import {
  findBracketOnLine,
  findChar,
  findMatchingBracket,
  firstNonBlank,
  isWhitespace,
  isWordEnd,
  lastNonBlank,
  nextWordEnd,
  nextWordStart,
  prevWordStart,
  type WordVariant,
} from "./vim-utils";

export interface FindState {
  char: string;
  direction: FindDirection;
}

export interface MotionContext {
  /** Column vertical motions aim for; Infinity after `$`. */
  preferredCol: number;
  lastFind: FindState | null;
  /** Operator targets may reach one past the last character. */
  forOperator: boolean;
}

const REVERSED_FIND: Record<FindDirection, FindDirection> = {
  f: "F",
  F: "f",
  t: "T",
  T: "t",
};

function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

function lastCharCol(line: string): number {
  return Math.max(0, line.length - 1);
}

function exclusive(pos: Position): MotionTarget {
  return { pos, linewise: false, inclusive: false };
}

function inclusive(pos: Position): MotionTarget {
  return { pos, linewise: false, inclusive: true };
}

function linewise(pos: Position): MotionTarget {
  return { pos, linewise: true, inclusive: true };
}

function wordVariant(kind: string): WordVariant {
  return kind.startsWith("WORD") ? "WORD" : "word";
}

function wordForwardTarget(
  lines: readonly string[],
  cursor: Position,
  variant: WordVariant,
  count: number,
  forOperator: boolean
): MotionTarget | null {
  let pos = cursor;
  let previous = cursor;
  let exhausted = false;
  for (let i = 0; i < count; i++) {
    const next = nextWordStart(lines, pos, variant);
    if (!next) {
      exhausted = true;
      break;
    }
    previous = pos;
    pos = next;
  }

  if (exhausted) {
    const lastLine = lines.length - 1;
    if (forOperator) {
      const end = { line: pos.line, col: lines[pos.line].length };
      if (end.line === cursor.line && end.col <= cursor.col) return null;
      return exclusive(end);
    }
    const end = { line: lastLine, col: lastCharCol(lines[lastLine]) };
    if (end.line === cursor.line && end.col === cursor.col) return null;
    return exclusive(end);
  }

  // An operator whose last word ends a line stops at that line's end
  if (
    forOperator &&
    pos.line > previous.line &&
    lines[previous.line].length > 0
  ) {
    return exclusive({
      line: previous.line,
      col: lines[previous.line].length,
    });
  }
  return exclusive(pos);
}

/** `cw`/`cW` on a non-blank changes to the end of the word, like `ce`. */
export function changeWordTarget(
  lines: readonly string[],
  cursor: Position,
  variant: WordVariant,
  count: number
): MotionTarget | null {
  const line = lines[cursor.line];
  const char = line[cursor.col];
  if (char === undefined || isWhitespace(char)) return null;

  let pos = cursor;
  for (let i = 0; i < count; i++) {
    if (i === 0 && isWordEnd(line, cursor.col, variant)) continue;
    const next = nextWordEnd(lines, pos, variant);
    if (!next) break;
    pos = next;
  }
  return inclusive(pos);
}

function findTarget(
  line: string,
  cursor: Position,
  find: FindState,
  count: number,
  repeat: boolean
): MotionTarget | null {
  let col = cursor.col;
  for (let i = 0; i < count; i++) {
    const found = findChar(line, col, find.char, find.direction, repeat || i > 0);
    if (found === null) return null;
    col = found;
  }
  const pos = { line: cursor.line, col };
  return find.direction === "f" || find.direction === "t"
    ? inclusive(pos)
    : exclusive(pos);
}

function paragraphForward(
  lines: readonly string[],
  cursor: Position,
  count: number
): MotionTarget | null {
  const last = lines.length - 1;
  let l = cursor.line;
  for (let i = 0; i < count; i++) {
    if (l >= last) break;
    while (l < last && isBlankLine(lines[l])) l++;
    while (l < last && !isBlankLine(lines[l])) l++;
  }
  if (isBlankLine(lines[l]) && l !== cursor.line) {
    return exclusive({ line: l, col: 0 });
  }
  const end = { line: last, col: lastCharCol(lines[last]) };
  if (end.line === cursor.line && end.col <= cursor.col) return null;
  // Running off the end of the buffer includes the last character
  return inclusive(end);
}

function paragraphBack(
  lines: readonly string[],
  cursor: Position,
  count: number
): MotionTarget | null {
  let l = cursor.line;
  for (let i = 0; i < count; i++) {
    if (l <= 0) break;
    while (l > 0 && isBlankLine(lines[l])) l--;
    while (l > 0 && !isBlankLine(lines[l])) l--;
  }
  if (l === cursor.line && cursor.col === 0) return null;
  return exclusive({ line: l, col: 0 });
}

function columnForLine(line: string, preferredCol: number): number {
  return Math.min(preferredCol, lastCharCol(line));
}

/**
 * Where `motion` repeated `count` times lands, or null when it cannot move
 * (a boundary, a missing character, no match). Motions that succeed without
 * moving (`0` at column 0) return the cursor position.
 */
export function resolveMotion(
  lines: readonly string[],
  cursor: Position,
  motion: BufferMotion,
  count: number,
  context: MotionContext
): MotionTarget | null {
  const n = Math.max(1, count);
  const line = lines[cursor.line];
  const lastLine = lines.length - 1;

  switch (motion.kind) {
    case "left":
      if (cursor.col === 0) return null;
      return exclusive({ line: cursor.line, col: Math.max(0, cursor.col - n) });

    case "right": {
      const limit = context.forOperator ? line.length : lastCharCol(line);
      if (cursor.col >= limit) return null;
      return exclusive({
        line: cursor.line,
        col: Math.min(cursor.col + n, limit),
      });
    }

    case "up": {
      if (cursor.line === 0) return null;
      const target = Math.max(0, cursor.line - n);
      return linewise({
        line: target,
        col: columnForLine(lines[target], context.preferredCol),
      });
    }

    case "down": {
      if (cursor.line >= lastLine) return null;
      const target = Math.min(lastLine, cursor.line + n);
      return linewise({
        line: target,
        col: columnForLine(lines[target], context.preferredCol),
      });
    }

    case "wordForward":
    case "WORDForward":
      return wordForwardTarget(
        lines,
        cursor,
        wordVariant(motion.kind),
        n,
        context.forOperator
      );

    case "wordBack":
    case "WORDBack": {
      let pos: Position | null = null;
      let from = cursor;
      for (let i = 0; i < n; i++) {
        const prev = prevWordStart(lines, from, wordVariant(motion.kind));
        if (!prev) break;
        pos = prev;
        from = prev;
      }
      return pos ? exclusive(pos) : null;
    }

    case "wordEnd":
    case "WORDEnd": {
      let pos: Position | null = null;
      let from = cursor;
      for (let i = 0; i < n; i++) {
        const next = nextWordEnd(lines, from, wordVariant(motion.kind));
        if (!next) break;
        pos = next;
        from = next;
      }
      return pos ? inclusive(pos) : null;
    }

    case "lineStart":
      return exclusive({ line: cursor.line, col: 0 });

    case "lineFirstNonBlank":
      return exclusive({ line: cursor.line, col: firstNonBlank(line) });

    case "lineEnd": {
      const target = Math.min(lastLine, cursor.line + n - 1);
      if (context.forOperator && target === cursor.line && line.length === 0) {
        return null;
      }
      return inclusive({ line: target, col: lastCharCol(lines[target]) });
    }

    case "lineLastNonBlank": {
      const target = Math.min(lastLine, cursor.line + n - 1);
      return inclusive({ line: target, col: lastNonBlank(lines[target]) });
    }

    case "fileStart":
      return linewise({ line: 0, col: firstNonBlank(lines[0]) });

    case "fileEnd":
      return linewise({ line: lastLine, col: firstNonBlank(lines[lastLine]) });

    case "toLine": {
      const target = Math.max(0, Math.min(motion.line, lastLine));
      return linewise({ line: target, col: firstNonBlank(lines[target]) });
    }

    case "findChar":
      return findTarget(
        line,
        cursor,
        { char: motion.char, direction: motion.direction },
        n,
        false
      );

    case "repeatFind":
    case "repeatFindReverse": {
      if (!context.lastFind) return null;
      const direction =
        motion.kind === "repeatFind"
          ? context.lastFind.direction
          : REVERSED_FIND[context.lastFind.direction];
      return findTarget(
        line,
        cursor,
        { char: context.lastFind.char, direction },
        n,
        true
      );
    }

    case "paragraphForward":
      return paragraphForward(lines, cursor, n);

    case "paragraphBack":
      return paragraphBack(lines, cursor, n);

    case "matchPair": {
      const bracketCol = findBracketOnLine(line, cursor.col);
      if (bracketCol === null) return null;
      const match = findMatchingBracket(lines, cursor.line, bracketCol);
      return match ? inclusive(match) : null;
    }
  }
}
