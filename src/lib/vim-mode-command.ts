import type { SearchDirection } from "./vim-types";
import type { CommandInterpreter, KeyResult } from "./vim-interpreter";
import { applyPlannedSubstitution, confirmPrompt } from "./vim-ex-commands";
import { insertableText } from "./vim-keys";
import { OK, applyOperator, rangeFromMotion } from "./vim-operators";
import { isValidRegister } from "./vim-registers";
import { wrapMessage } from "./vim-mode-normal";

const ERROR_MESSAGE = /^E\d+:/;

function cancelCommandLine(editor: CommandInterpreter): KeyResult {
  editor.modes.leaveCommand();
  editor.buffer.clampCursor();
  editor.searchOperator = null;
  editor.searchCount = undefined;
  editor.commandRegisterPending = false;
  editor.changeInProgress = null;
  return OK;
}

function runExCommand(editor: CommandInterpreter, text: string): KeyResult {
  editor.modes.leaveCommand();
  editor.buffer.clampCursor();

  const result = editor.ex.execute(text, editor);
  if (result.confirm) {
    editor.confirm = result.confirm;
  }
  const message = result.message;
  return {
    message,
    failed: message !== null && ERROR_MESSAGE.test(message),
  };
}

function runSearch(
  editor: CommandInterpreter,
  pattern: string,
  direction: SearchDirection
): KeyResult {
  const { buffer, search, modes } = editor;
  const operator = editor.searchOperator;
  const count = operator ? operator.count ?? 1 : editor.searchCount ?? 1;
  editor.searchOperator = null;
  editor.searchCount = undefined;
  modes.leaveCommand();
  buffer.clampCursor();

  const resolved = search.resolvePattern(pattern);
  if (resolved === null) {
    editor.changeInProgress = null;
    return { message: "E35: No previous regular expression", failed: true };
  }

  const from = buffer.cursor;
  const pos = search.search(buffer.view(), resolved, direction, from, count);
  if (!pos) {
    editor.changeInProgress = null;
    return { message: `E486: Pattern not found: ${resolved}`, failed: true };
  }
  const wrapped = search.lastWrapped ? wrapMessage(direction) : null;

  if (!operator) {
    buffer.placeCursor(pos);
    return { message: wrapped, failed: false };
  }

  const range = rangeFromMotion(buffer.view(), from, {
    pos,
    linewise: false,
    inclusive: false,
  });
  if (!range) {
    editor.finishChange();
    return { message: wrapped, failed: false };
  }
  const result = applyOperator(editor, operator.operator, range, {
    register: operator.register,
  });
  // a change keeps recording its keys until insert mode ends
  if (modes.mode === "normal") editor.finishChange();
  return { message: result.message ?? wrapped, failed: result.failed };
}

function deleteLastWord(text: string): string {
  return text.replace(/(\w+|[^\w\s]+)?\s*$/, "");
}

/** One key typed on the `:`, `/` or `?` line. */
export function handleCommandLineKeystroke(
  editor: CommandInterpreter,
  keystroke: string
): KeyResult {
  const { modes, registers } = editor;
  const prompt = modes.commandPrompt;
  if (prompt === null) return OK;
  const text = modes.commandText;

  if (editor.commandRegisterPending) {
    editor.commandRegisterPending = false;
    if (isValidRegister(keystroke)) {
      const entry = registers.read(keystroke);
      if (entry) modes.setCommandText(text + entry.text.split("\n")[0]);
    }
    return OK;
  }

  switch (keystroke) {
    case "<Esc>":
      return cancelCommandLine(editor);
    case "<CR>":
      if (prompt === ":") return runExCommand(editor, text);
      return runSearch(editor, text, prompt === "/" ? "forward" : "backward");
    case "<BS>":
      if (text === "") return cancelCommandLine(editor);
      modes.setCommandText(text.slice(0, -1));
      return OK;
    case "<C-u>":
      modes.setCommandText("");
      return OK;
    case "<C-w>":
      modes.setCommandText(deleteLastWord(text));
      return OK;
    case "<C-r>":
      editor.commandRegisterPending = true;
      return OK;
  }

  const typed = insertableText(keystroke);
  if (typed !== null) modes.setCommandText(text + typed);
  return OK;
}

/** Answers to `replace with X (y/n/a/q/l)?`. */
export function handleConfirmKeystroke(
  editor: CommandInterpreter,
  keystroke: string
): KeyResult {
  const confirm = editor.confirm;
  if (!confirm) return OK;
  const current = confirm.planned[confirm.index];
  let done = false;

  switch (keystroke) {
    case "y":
      confirm.accepted.push(current);
      confirm.index++;
      break;
    case "l":
      confirm.accepted.push(current);
      done = true;
      break;
    case "n":
      confirm.index++;
      break;
    case "a":
      confirm.accepted.push(...confirm.planned.slice(confirm.index));
      done = true;
      break;
    case "q":
    case "<Esc>":
      done = true;
      break;
    default:
      return OK;
  }

  if (!done && confirm.index < confirm.planned.length) {
    return { message: confirmPrompt(confirm.planned[confirm.index]), failed: false };
  }
  editor.confirm = null;
  return { message: applyPlannedSubstitution(editor, confirm.accepted), failed: false };
}
