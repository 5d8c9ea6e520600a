import type { OpenBracket, Position, QuoteChar, TextObject, TextRange } from "./vim-types";
import { charClass, isWhitespace, type CharClass } from "./vim-utils";

const CLOSING: Record<OpenBracket, string> = {
  "(": ")",
  "[": "]",
  "{": "}",
  "<": ">",
};

function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

function charRange(line: number, start: number, end: number): TextRange {
  return {
    start: { line, col: start },
    end: { line, col: end },
    linewise: false,
  };
}

function wordObject(
  line: string,
  lineNo: number,
  col: number,
  bigWord: boolean,
  around: boolean
): TextRange | null {
  if (line.length === 0) return null;
  const classOf = (c: string): CharClass =>
    bigWord && !isWhitespace(c) ? "keyword" : charClass(c);

  const anchor = Math.min(col, line.length - 1);
  const anchorClass = classOf(line[anchor]);
  let start = anchor;
  let end = anchor;
  while (start > 0 && classOf(line[start - 1]) === anchorClass) start--;
  while (end < line.length - 1 && classOf(line[end + 1]) === anchorClass) end++;

  if (!around) return charRange(lineNo, start, end);

  if (anchorClass === "space") {
    // `aw` on blanks takes the blanks plus the following word
    if (end + 1 >= line.length) return charRange(lineNo, start, end);
    const wordClass = classOf(line[end + 1]);
    let wordEnd = end + 1;
    while (wordEnd < line.length - 1 && classOf(line[wordEnd + 1]) === wordClass) {
      wordEnd++;
    }
    return charRange(lineNo, start, wordEnd);
  }

  let after = end + 1;
  while (after < line.length && isWhitespace(line[after])) after++;
  if (after > end + 1) return charRange(lineNo, start, after - 1);

  // No trailing blanks: take the leading ones instead
  let before = start;
  while (before > 0 && isWhitespace(line[before - 1])) before--;
  return charRange(lineNo, before, end);
}

function paragraphObject(
  lines: readonly string[],
  lineNo: number,
  around: boolean
): TextRange {
  const blank = isBlankLine(lines[lineNo]);
  let first = lineNo;
  let last = lineNo;
  while (first > 0 && isBlankLine(lines[first - 1]) === blank) first--;
  while (last < lines.length - 1 && isBlankLine(lines[last + 1]) === blank) {
    last++;
  }

  if (around) {
    if (last < lines.length - 1) {
      // the neighbouring block of the other kind comes along
      last++;
      while (last < lines.length - 1 && isBlankLine(lines[last + 1]) !== blank) {
        last++;
      }
    } else if (!blank) {
      while (first > 0 && isBlankLine(lines[first - 1])) first--;
    }
  }

  return {
    start: { line: first, col: 0 },
    end: { line: last, col: Math.max(0, lines[last].length - 1) },
    linewise: true,
  };
}

function quotePositions(line: string, quote: QuoteChar): number[] {
  const positions: number[] = [];
  for (let i = 0; i < line.length; i++) {
    if (line[i] === quote && line[i - 1] !== "\\") positions.push(i);
  }
  return positions;
}

function quoteObject(
  line: string,
  lineNo: number,
  col: number,
  quote: QuoteChar,
  around: boolean
): TextRange | null {
  const positions = quotePositions(line, quote);
  let open = -1;
  let close = -1;
  for (let i = 0; i + 1 < positions.length; i += 2) {
    if (positions[i] <= col && col <= positions[i + 1]) {
      open = positions[i];
      close = positions[i + 1];
      break;
    }
  }
  if (open === -1) {
    // Cursor before any quoted string: use the first one after it
    const nextPair = positions.findIndex((p, i) => i % 2 === 0 && p > col);
    if (nextPair === -1 || nextPair + 1 >= positions.length) return null;
    open = positions[nextPair];
    close = positions[nextPair + 1];
  }

  if (!around) return charRange(lineNo, open + 1, close - 1);

  let end = close;
  while (end + 1 < line.length && isWhitespace(line[end + 1])) end++;
  let start = open;
  if (end === close) {
    while (start > 0 && isWhitespace(line[start - 1])) start--;
  }
  return charRange(lineNo, start, end);
}

function findEnclosingOpen(
  lines: readonly string[],
  from: Position,
  open: string,
  close: string
): Position | null {
  let depth = 0;
  for (let l = from.line; l >= 0; l--) {
    const text = lines[l];
    const startCol = l === from.line ? from.col : text.length - 1;
    for (let i = startCol; i >= 0; i--) {
      if (text[i] === close) {
        depth++;
      } else if (text[i] === open) {
        if (depth === 0) return { line: l, col: i };
        depth--;
      }
    }
  }
  return null;
}

function findClosing(
  lines: readonly string[],
  openPos: Position,
  open: string,
  close: string
): Position | null {
  let depth = 0;
  for (let l = openPos.line; l < lines.length; l++) {
    const text = lines[l];
    const startCol = l === openPos.line ? openPos.col + 1 : 0;
    for (let i = startCol; i < text.length; i++) {
      if (text[i] === open) {
        depth++;
      } else if (text[i] === close) {
        if (depth === 0) return { line: l, col: i };
        depth--;
      }
    }
  }
  return null;
}

function bracketObject(
  lines: readonly string[],
  cursor: Position,
  openChar: OpenBracket,
  around: boolean,
  count: number
): TextRange | null {
  const closeChar = CLOSING[openChar];
  const onClose = lines[cursor.line][cursor.col] === closeChar;
  let from: Position = onClose
    ? { line: cursor.line, col: cursor.col - 1 }
    : cursor;

  let openPos: Position | null = null;
  for (let level = 0; level < count; level++) {
    if (from.col < 0) {
      if (from.line === 0) return null;
      from = { line: from.line - 1, col: lines[from.line - 1].length - 1 };
    }
    openPos = findEnclosingOpen(lines, from, openChar, closeChar);
    if (!openPos) return null;
    from = { line: openPos.line, col: openPos.col - 1 };
  }
  if (!openPos) return null;

  const closePos = findClosing(lines, openPos, openChar, closeChar);
  if (!closePos) return null;

  if (around) {
    return { start: openPos, end: closePos, linewise: false };
  }

  const openLine = lines[openPos.line];
  const closePrefix = lines[closePos.line].slice(0, closePos.col);
  if (
    openPos.col === openLine.length - 1 &&
    closePos.line > openPos.line + 1 &&
    closePrefix.trim() === ""
  ) {
    // Block on its own lines: the inner object is those lines
    const last = closePos.line - 1;
    return {
      start: { line: openPos.line + 1, col: 0 },
      end: { line: last, col: Math.max(0, lines[last].length - 1) },
      linewise: true,
    };
  }

  const start =
    openPos.col + 1 < openLine.length
      ? { line: openPos.line, col: openPos.col + 1 }
      : { line: openPos.line + 1, col: 0 };
  const end =
    closePos.col > 0
      ? { line: closePos.line, col: closePos.col - 1 }
      : {
          line: closePos.line - 1,
          col: lines[closePos.line - 1].length - 1,
        };
  return { start, end, linewise: false };
}

/**
 * Range of a text object around `cursor`, or null when there is none. An
 * empty inner object (`i(` on `()`) has its `end` one column before `start`.
 */
export function getTextObject(
  lines: readonly string[],
  cursor: Position,
  object: TextObject,
  count = 1
): TextRange | null {
  const line = lines[cursor.line];
  switch (object.kind) {
    case "word":
    case "WORD":
      return wordObject(
        line,
        cursor.line,
        cursor.col,
        object.kind === "WORD",
        object.around
      );
    case "paragraph":
      return paragraphObject(lines, cursor.line, object.around);
    case "quote":
      return quoteObject(line, cursor.line, cursor.col, object.quote, object.around);
    case "bracket":
      return bracketObject(lines, cursor, object.open, object.around, Math.max(1, count));
  }
}

export function isEmptyRange(range: TextRange): boolean {
  return (
    range.end.line < range.start.line ||
    (range.end.line === range.start.line && range.end.col < range.start.col)
  );
}
