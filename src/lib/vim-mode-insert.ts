import type { Position } from "./vim-types";
import type { CommandInterpreter, InsertSession, KeyResult } from "./vim-interpreter";
import { insertableText } from "./vim-keys";
import { isValidRegister } from "./vim-registers";
import { OK, textTooLong } from "./vim-operators";
import { charClass, isWhitespace, leadingWhitespace } from "./vim-utils";
import { openLine } from "./vim-mode-normal";

function insertText(editor: CommandInterpreter, session: InsertSession, text: string): void {
  const { buffer } = editor;
  if (editor.modes.mode !== "replace") {
    buffer.placeCursor(buffer.insertAt(buffer.cursor, text));
    return;
  }

  for (const char of text) {
    const cursor = buffer.cursor;
    if (char === "\n") {
      buffer.placeCursor(buffer.insertAt(cursor, "\n"));
      continue;
    }
    const line = buffer.getLine(cursor.line);
    if (cursor.col < line.length) {
      session.replaced.push(line[cursor.col]);
      buffer.replaceLine(
        cursor.line,
        line.slice(0, cursor.col) + char + line.slice(cursor.col + 1)
      );
    } else {
      session.replaced.push(null);
      buffer.replaceLine(cursor.line, line + char);
    }
    buffer.placeCursor({ line: cursor.line, col: cursor.col + 1 });
  }
}

/** Removes text before the cursor back to `from`, joining lines at column 0. */
function deleteBackTo(editor: CommandInterpreter, from: Position): void {
  const { buffer } = editor;
  buffer.deleteRange(from, buffer.cursor);
  buffer.placeCursor(from);
}

function backspace(editor: CommandInterpreter, session: InsertSession): void {
  const { buffer } = editor;
  const cursor = buffer.cursor;

  if (editor.modes.mode === "replace") {
    if (cursor.col === 0) return;
    const original = session.replaced.pop();
    const line = buffer.getLine(cursor.line);
    const col = cursor.col - 1;
    if (original === undefined) {
      buffer.placeCursor({ line: cursor.line, col });
      return;
    }
    buffer.replaceLine(
      cursor.line,
      original === null
        ? line.slice(0, col) + line.slice(col + 1)
        : line.slice(0, col) + original + line.slice(col + 1)
    );
    buffer.placeCursor({ line: cursor.line, col });
    return;
  }

  if (cursor.col > 0) {
    deleteBackTo(editor, { line: cursor.line, col: cursor.col - 1 });
  } else if (cursor.line > 0) {
    deleteBackTo(editor, {
      line: cursor.line - 1,
      col: buffer.lineLength(cursor.line - 1),
    });
  }
}

function deleteWordBefore(editor: CommandInterpreter): void {
  const { buffer } = editor;
  const cursor = buffer.cursor;
  if (cursor.col === 0) {
    if (cursor.line > 0) {
      deleteBackTo(editor, {
        line: cursor.line - 1,
        col: buffer.lineLength(cursor.line - 1),
      });
    }
    return;
  }

  const line = buffer.getLine(cursor.line);
  let col = cursor.col;
  while (col > 0 && isWhitespace(line[col - 1])) col--;
  if (col > 0) {
    const cls = charClass(line[col - 1]);
    while (col > 0 && charClass(line[col - 1]) === cls) col--;
  }
  deleteBackTo(editor, { line: cursor.line, col });
}

function deleteToInsertStart(editor: CommandInterpreter, session: InsertSession): void {
  const cursor = editor.buffer.cursor;
  const from =
    session.start.line === cursor.line && session.start.col < cursor.col
      ? session.start.col
      : 0;
  if (from < cursor.col) deleteBackTo(editor, { line: cursor.line, col: from });
}

function deleteUnderCursor(editor: CommandInterpreter): void {
  const { buffer } = editor;
  const cursor = buffer.cursor;
  const length = buffer.lineLength(cursor.line);
  if (cursor.col < length) {
    buffer.deleteRange(cursor, { line: cursor.line, col: cursor.col + 1 });
  } else if (cursor.line < buffer.lineCount() - 1) {
    buffer.deleteRange(cursor, { line: cursor.line + 1, col: 0 });
  }
  buffer.placeCursor(cursor);
}

function moveInInsert(editor: CommandInterpreter, key: string): void {
  const { buffer } = editor;
  const { line, col } = buffer.cursor;
  switch (key) {
    case "<Left>":
      buffer.placeCursor({ line, col: col - 1 });
      return;
    case "<Right>":
      buffer.placeCursor({ line, col: col + 1 });
      return;
    case "<Up>":
      buffer.placeCursor({ line: line - 1, col });
      return;
    case "<Down>":
      buffer.placeCursor({ line: line + 1, col });
  }
}

/** Applies one key (anything but `<Esc>`) to the open session. */
function applyInsertKey(
  editor: CommandInterpreter,
  session: InsertSession,
  key: string
): void {
  const { buffer, registers, options } = editor;

  if (session.registerPending) {
    session.registerPending = false;
    if (!isValidRegister(key)) return;
    const entry = registers.read(key);
    if (entry) insertText(editor, session, entry.linewise ? `${entry.text}\n` : entry.text);
    return;
  }

  switch (key) {
    case "<CR>": {
      const indent = options.autoindent
        ? leadingWhitespace(buffer.getLine(buffer.cursor.line))
        : "";
      buffer.placeCursor(buffer.insertAt(buffer.cursor, `\n${indent}`));
      return;
    }
    case "<BS>":
      backspace(editor, session);
      return;
    case "<Del>":
      deleteUnderCursor(editor);
      return;
    case "<C-w>":
      deleteWordBefore(editor);
      return;
    case "<C-u>":
      deleteToInsertStart(editor, session);
      return;
    case "<C-r>":
      session.registerPending = true;
      return;
    case "<Left>":
    case "<Right>":
    case "<Up>":
    case "<Down>":
      moveInInsert(editor, key);
      return;
  }

  const text = insertableText(key);
  if (text !== null) insertText(editor, session, text);
}

/** Copies what was typed on the block's first line onto the others. */
function replicateBlockInsert(editor: CommandInterpreter, session: InsertSession): void {
  const block = session.block;
  const { buffer } = editor;
  const cursor = buffer.cursor;
  if (!block || cursor.line !== block.top || cursor.col <= block.col) return;

  const text = buffer.getLine(block.top).slice(block.col, cursor.col);
  for (let l = block.top + 1; l <= block.bottom; l++) {
    let line = buffer.getLine(l);
    if (line.length < block.col) {
      if (!block.append) continue;
      line = line.padEnd(block.col, " ");
    }
    buffer.replaceLine(l, line.slice(0, block.col) + text + line.slice(block.col));
  }
}

/** Returns false, inserting nothing more, when the repeats would not fit. */
function repeatTyped(editor: CommandInterpreter, session: InsertSession): boolean {
  const { buffer } = editor;
  const opensLines = session.entry === "openBelow" || session.entry === "openAbove";
  if (session.count <= 1 || (session.typed.length === 0 && !opensLines)) return true;

  const grown = buffer.textLength() - session.startLength;
  const perRepeat = Math.max(grown, session.typed.length) + (opensLines ? 1 : 0);
  if (buffer.wouldExceed((session.count - 1) * perRepeat)) return false;

  for (let i = 1; i < session.count; i++) {
    if (opensLines) {
      const line = buffer.cursor.line;
      buffer.placeCursor(openLine(editor, line + 1, line));
    }
    for (const key of session.typed) applyInsertKey(editor, session, key);
  }
  return true;
}

function leaveInsert(editor: CommandInterpreter, session: InsertSession): KeyResult {
  const { buffer, history, modes } = editor;

  const repeated = repeatTyped(editor, session);
  replicateBlockInsert(editor, session);

  const cursor = buffer.cursor;
  const length = buffer.lineLength(cursor.line);
  editor.resumeAtLineEnd = length > 0 && cursor.col === length;

  editor.insertSession = null;
  modes.toNormal();
  buffer.allowPastEnd = false;
  buffer.placeCursor({ line: cursor.line, col: cursor.col - 1 });
  history.discardLastIfUnchanged();
  editor.finishChange();
  return repeated ? OK : textTooLong();
}

export function handleInsertModeKeystroke(
  editor: CommandInterpreter,
  keystroke: string
): KeyResult {
  let session = editor.insertSession;
  if (!session) {
    // Restored straight into insert mode: open a session here
    editor.history.snapshotBeforeChange();
    session = editor.startInsert(editor.buffer.cursor, {
      replace: editor.modes.mode === "replace",
    });
  }

  if (keystroke === "<Esc>" && !session.registerPending) {
    return leaveInsert(editor, session);
  }

  session.typed.push(keystroke);
  applyInsertKey(editor, session, keystroke);
  return OK;
}
