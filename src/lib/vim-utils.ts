import type { FindDirection, Position } from "./vim-types";

export type WordVariant = "word" | "WORD";
export type CharClass = "space" | "keyword" | "punct";

export function isWordChar(c: string): boolean {
  return /[a-zA-Z0-9_]/.test(c);
}

export function isWhitespace(c: string): boolean {
  return /\s/.test(c);
}

export function charClass(c: string): CharClass {
  if (isWhitespace(c)) return "space";
  if (isWordChar(c)) return "keyword";
  return "punct";
}

export function toggleCase(str: string): string {
  return str
    .split("")
    .map((c) => {
      if (c === c.toUpperCase()) return c.toLowerCase();
      return c.toUpperCase();
    })
    .join("");
}

export function firstNonBlank(line: string): number {
  const idx = line.search(/\S/);
  return idx === -1 ? Math.max(0, line.length - 1) : idx;
}

export function lastNonBlank(line: string): number {
  const idx = line.search(/\S\s*$/);
  return idx === -1 ? Math.max(0, line.length - 1) : idx;
}

export function leadingWhitespace(line: string): string {
  const match = line.match(/^\s*/);
  return match ? match[0] : "";
}

export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.col - b.col;
}

export function orderPositions(a: Position, b: Position): [Position, Position] {
  return comparePositions(a, b) <= 0 ? [a, b] : [b, a];
}

/**
 * Punctuation glued to the end of a keyword and followed by a blank or the end
 * of the line (`hello,` or `end.`) belongs to that keyword.
 */
function isTrailingPunctuation(line: string, i: number): boolean {
  let j = i;
  while (j < line.length && charClass(line[j]) === "punct") j++;
  return j >= line.length || isWhitespace(line[j]);
}

export function isWordStart(
  line: string,
  i: number,
  variant: WordVariant
): boolean {
  const c = line[i];
  if (c === undefined || isWhitespace(c)) return false;
  if (i === 0) return true;
  const prev = line[i - 1];
  if (isWhitespace(prev)) return true;
  if (variant === "WORD") return false;

  const cls = charClass(c);
  const prevCls = charClass(prev);
  if (cls === prevCls) return false;
  if (cls === "punct" && prevCls === "keyword" && isTrailingPunctuation(line, i)) {
    return false;
  }
  return true;
}

export function isWordEnd(
  line: string,
  i: number,
  variant: WordVariant
): boolean {
  const c = line[i];
  if (c === undefined || isWhitespace(c)) return false;
  const next = line[i + 1];
  if (next === undefined || isWhitespace(next)) return true;
  return isWordStart(line, i + 1, variant);
}

// Cursor-reachable positions: every character, plus column 0 of empty lines.
function nextPosition(lines: readonly string[], pos: Position): Position | null {
  if (pos.col + 1 < lines[pos.line].length) {
    return { line: pos.line, col: pos.col + 1 };
  }
  if (pos.line + 1 < lines.length) return { line: pos.line + 1, col: 0 };
  return null;
}

function prevPosition(lines: readonly string[], pos: Position): Position | null {
  if (pos.col > 0) return { line: pos.line, col: pos.col - 1 };
  if (pos.line === 0) return null;
  const prevLine = lines[pos.line - 1];
  return { line: pos.line - 1, col: Math.max(0, prevLine.length - 1) };
}

function isWordStop(
  lines: readonly string[],
  pos: Position,
  variant: WordVariant
): boolean {
  const line = lines[pos.line];
  if (line.length === 0) return true;
  return isWordStart(line, pos.col, variant);
}

export function nextWordStart(
  lines: readonly string[],
  from: Position,
  variant: WordVariant
): Position | null {
  let pos = nextPosition(lines, from);
  while (pos) {
    if (isWordStop(lines, pos, variant)) return pos;
    pos = nextPosition(lines, pos);
  }
  return null;
}

export function prevWordStart(
  lines: readonly string[],
  from: Position,
  variant: WordVariant
): Position | null {
  let pos = prevPosition(lines, from);
  while (pos) {
    if (isWordStop(lines, pos, variant)) return pos;
    pos = prevPosition(lines, pos);
  }
  return null;
}

export function nextWordEnd(
  lines: readonly string[],
  from: Position,
  variant: WordVariant
): Position | null {
  let pos = nextPosition(lines, from);
  while (pos) {
    if (isWordEnd(lines[pos.line], pos.col, variant)) return pos;
    pos = nextPosition(lines, pos);
  }
  return null;
}

export function findChar(
  line: string,
  col: number,
  char: string,
  direction: FindDirection,
  repeat = false
): number | null {
  const forward = direction === "f" || direction === "t";
  const till = direction === "t" || direction === "T";

  let i = forward ? col + 1 : col - 1;
  // `;` after t/T must not stop in front of the same character again
  if (till && repeat) i = forward ? i + 1 : i - 1;

  while (forward ? i < line.length : i >= 0) {
    if (line[i] === char) {
      return till ? (forward ? i - 1 : i + 1) : i;
    }
    i = forward ? i + 1 : i - 1;
  }

  return null;
}

const BRACKET_PAIRS: Record<string, string> = {
  "(": ")",
  "[": "]",
  "{": "}",
  ")": "(",
  "]": "[",
  "}": "{",
};

export function findMatchingBracket(
  lines: readonly string[],
  line: number,
  col: number
): Position | null {
  const char = lines[line][col];
  const target = BRACKET_PAIRS[char];
  if (!target) return null;

  const forward = "([{".includes(char);
  let depth = 1;
  let l = line;
  let c = col;

  while (depth > 0) {
    if (forward) {
      c++;
      if (c >= lines[l].length) {
        l++;
        c = -1;
        if (l >= lines.length) return null;
        continue;
      }
    } else {
      c--;
      if (c < 0) {
        l--;
        if (l < 0) return null;
        c = lines[l].length;
        continue;
      }
    }

    const current = lines[l][c];
    if (current === char) {
      depth++;
    } else if (current === target) {
      depth--;
      if (depth === 0) {
        return { line: l, col: c };
      }
    }
  }

  return null;
}

/** First bracket at or after `col` on the line, as `%` looks for one. */
export function findBracketOnLine(line: string, col: number): number | null {
  for (let i = col; i < line.length; i++) {
    if (BRACKET_PAIRS[line[i]]) return i;
  }
  return null;
}
