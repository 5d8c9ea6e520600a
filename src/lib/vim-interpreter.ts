import type {
  InsertEntry,
  Operator,
  ParsedCommand,
  Position,
  Selection,
  VimMode,
  VisualKind,
} from "./vim-types";
import type { TextBuffer } from "./vim-buffer";
import type { HistoryManager } from "./vim-history";
import type { MacroRecorder } from "./vim-macros";
import type { ModeStateMachine } from "./vim-modes";
import type { SimulatorOptions } from "./vim-options";
import type { RegisterStore } from "./vim-registers";
import type { SearchEngine } from "./vim-search";
import { parseCommand } from "./vim-command-parser";
import {
  ExCommandRunner,
  confirmPrompt,
  type ExHost,
  type LineRange,
  type SubstituteConfirm,
} from "./vim-ex-commands";
import { encodeKeys } from "./vim-keys";
import { orderPositions } from "./vim-utils";
import { resolveNormalCommand } from "./vim-mode-normal";
import { resolveVisualCommand } from "./vim-mode-visual";
import { handleInsertModeKeystroke } from "./vim-mode-insert";
import {
  handleCommandLineKeystroke,
  handleConfirmKeystroke,
} from "./vim-mode-command";
import { textTooLong } from "./vim-operators";

export interface KeyResult {
  message: string | null;
  /** The key was an error (vi would beep); macro playback stops on it. */
  failed: boolean;
}

export interface BlockInsert {
  top: number;
  bottom: number;
  col: number;
  append: boolean;
}

export interface InsertSession {
  /** Times the typed text is inserted in total (`3ihi<Esc>`). */
  count: number;
  entry: InsertEntry | null;
  typed: string[];
  block: BlockInsert | null;
  /** Characters overwritten in replace mode, newest last; null marks an append. */
  replaced: Array<string | null>;
  registerPending: boolean;
  start: Position;
  /** Buffer size when the session opened. */
  startLength: number;
}

export interface SavedSelection {
  kind: VisualKind;
  anchor: Position;
  cursor: Position;
}

export interface SearchOperator {
  operator: Operator;
  count?: number;
  register?: string;
}

export interface EditorParts {
  buffer: TextBuffer;
  registers: RegisterStore;
  search: SearchEngine;
  history: HistoryManager;
  modes: ModeStateMachine;
  macros: MacroRecorder;
  options: SimulatorOptions;
}

export interface InsertOptions {
  count?: number;
  entry?: InsertEntry;
  block?: BlockInsert;
  replace?: boolean;
}

const IDLE: KeyResult = { message: null, failed: false };

/** Commands after which an `i` still resumes at the end of the line. */
function keepsResumePoint(command: ParsedCommand): boolean {
  return (
    command.kind === "action" &&
    (command.action.kind === "stopRecording" ||
      command.action.kind === "playMacro")
  );
}

function isRepeatableChange(command: ParsedCommand): boolean {
  if (command.kind === "operate") return command.operator !== "yank";
  if (command.kind !== "action") return false;
  switch (command.action.kind) {
    case "put":
    case "joinLines":
    case "toggleCaseChar":
    case "replaceChar":
    case "insert":
    case "replaceMode":
      return true;
    default:
      return false;
  }
}

/** Splits the count typed in front of a command from the rest of its keys. */
function stripCount(keys: readonly string[]): string[] {
  let i = 0;
  while (i < keys.length && /^[0-9]$/.test(keys[i]) && !(i === 0 && keys[i] === "0")) {
    i++;
  }
  return keys.slice(i);
}

/**
 * Turns keys into editor actions. Owns the per-key state (pending command,
 * insert session, command line, dot-repeat record) but none of the buffer,
 * register or history data, which belong to the simulator.
 */
export class CommandInterpreter implements ExHost {
  readonly buffer: TextBuffer;
  readonly registers: RegisterStore;
  readonly search: SearchEngine;
  readonly history: HistoryManager;
  readonly modes: ModeStateMachine;
  readonly macros: MacroRecorder;
  readonly options: SimulatorOptions;
  readonly ex = new ExCommandRunner();

  pendingKeys: string[] = [];
  insertSession: InsertSession | null = null;
  confirm: SubstituteConfirm | null = null;
  searchOperator: SearchOperator | null = null;
  searchCount: number | undefined;
  commandRegisterPending = false;
  lastSelection: SavedSelection | null = null;
  resumeAtLineEnd = false;
  changeInProgress: string[] | null = null;
  lastChange: string[] | null = null;
  lastCommand: string | null = null;

  constructor(
    parts: EditorParts,
    private readonly feedKey: (token: string) => KeyResult
  ) {
    this.buffer = parts.buffer;
    this.registers = parts.registers;
    this.search = parts.search;
    this.history = parts.history;
    this.modes = parts.modes;
    this.macros = parts.macros;
    this.options = parts.options;
  }

  get pendingText(): string {
    return encodeKeys(this.pendingKeys);
  }

  /** Mode as callers see it; a pending `:s///c` prompt counts as the command line. */
  get mode(): VimMode {
    return this.confirm ? "command" : this.modes.mode;
  }

  get commandLine(): string | null {
    if (this.confirm) {
      const next = this.confirm.planned[this.confirm.index];
      return next ? confirmPrompt(next) : null;
    }
    return this.modes.commandLine;
  }

  handleKey(token: string): KeyResult {
    if (this.confirm) return handleConfirmKeystroke(this, token);

    switch (this.modes.mode) {
      case "insert":
      case "replace":
        this.changeInProgress?.push(token);
        return handleInsertModeKeystroke(this, token);
      case "command":
        this.changeInProgress?.push(token);
        return handleCommandLineKeystroke(this, token);
      default:
        return this.handleCommandKey(token);
    }
  }

  /** Closes the change being typed; its keys become what `.` repeats. */
  finishChange(): void {
    if (this.changeInProgress) this.lastChange = this.changeInProgress;
    this.changeInProgress = null;
  }

  private handleCommandKey(token: string): KeyResult {
    this.pendingKeys.push(token);
    const visual = this.modes.state.kind === "visual";
    const parsed = parseCommand(this.pendingKeys, {
      visual,
      recording: this.macros.recording !== null,
    });
    if (parsed.status === "pending") return IDLE;

    const keys = this.pendingKeys;
    this.pendingKeys = [];
    if (parsed.status === "invalid") {
      return { message: parsed.message, failed: parsed.message !== null };
    }

    const command = parsed.command;
    this.lastCommand = encodeKeys(keys);
    const resume = this.resumeAtLineEnd;
    if (!keepsResumePoint(command)) this.resumeAtLineEnd = false;

    if (visual) return resolveVisualCommand(this, command);

    const result = resolveNormalCommand(this, command, resume);
    if (!result.failed && isRepeatableChange(command)) {
      if (this.modes.mode === "normal") {
        this.lastChange = [...keys];
      } else {
        this.changeInProgress = [...keys];
      }
    }
    return result;
  }

  /** Enters insert (or replace) mode at `pos`; the caller owns the undo snapshot. */
  startInsert(pos: Position, options: InsertOptions = {}): InsertSession {
    if (options.replace) {
      this.modes.enterReplace();
    } else {
      this.modes.enterInsert();
    }
    this.buffer.allowPastEnd = true;
    this.buffer.placeCursor(pos);
    this.insertSession = {
      count: Math.max(1, options.count ?? 1),
      entry: options.entry ?? null,
      typed: [],
      block: options.block ?? null,
      replaced: [],
      registerPending: false,
      start: this.buffer.cursor,
      startLength: this.buffer.textLength(),
    };
    return this.insertSession;
  }

  /** Current selection, normalized so `start` comes first. */
  selection(): Selection | null {
    const anchor = this.modes.visualAnchor;
    const kind = this.modes.visualKind;
    if (!anchor || !kind) return null;
    const [start, end] = orderPositions(anchor, this.buffer.cursor);
    return { kind, start, end };
  }

  /** Remembers the selection for `'<,'>` before visual mode ends. */
  saveSelection(): void {
    const anchor = this.modes.visualAnchor;
    const kind = this.modes.visualKind;
    if (!anchor || !kind) return;
    this.lastSelection = { kind, anchor, cursor: this.buffer.cursor };
  }

  leaveVisual(): void {
    this.saveSelection();
    this.modes.toNormal();
    this.buffer.clampCursor();
  }

  visualLineRange(): LineRange | null {
    const saved = this.lastSelection;
    if (!saved) return null;
    return {
      start: Math.min(saved.anchor.line, saved.cursor.line),
      end: Math.max(saved.anchor.line, saved.cursor.line),
    };
  }

  undo(count: number): string | null {
    let undone = 0;
    for (let i = 0; i < Math.max(1, count); i++) {
      if (!this.history.undo()) break;
      undone++;
    }
    this.buffer.clampCursor();
    return undone === 0 ? "Already at oldest change" : null;
  }

  redo(count: number): string | null {
    let redone = 0;
    for (let i = 0; i < Math.max(1, count); i++) {
      if (!this.history.redo()) break;
      redone++;
    }
    this.buffer.clampCursor();
    return redone === 0 ? "Already at newest change" : null;
  }

  /** `.`: feeds the last change's keys again; a count replaces the old one. */
  repeatLastChange(count?: number): KeyResult {
    if (!this.lastChange) return { message: null, failed: true };
    const keys =
      count === undefined
        ? this.lastChange
        : [...String(count).split(""), ...stripCount(this.lastChange)];

    let message: string | null = null;
    let failed = false;
    for (const key of keys) {
      const result = this.handleKey(key);
      message = result.message ?? message;
      failed = failed || result.failed;
    }
    return { message, failed };
  }

  /** `@r`: replays a register through the same entry point as typed keys. */
  playMacro(register: string, count: number): KeyResult {
    const name = register === "@" ? this.macros.lastPlayedRegister ?? register : register;
    if (name === ":") {
      const previous = this.ex.previousCommand;
      if (!previous) return { message: "E30: No previous command line", failed: true };
      this.macros.markPlayed(":");
      let message: string | null = null;
      const times = Math.min(Math.max(1, count), this.options.maxMacroKeys);
      for (let i = 0; i < times; i++) {
        const text = this.buffer.getText();
        const cursor = this.buffer.cursor;
        message = this.ex.execute(previous, this).message;
        if (this.buffer.wouldExceed(0)) return textTooLong();
        // Further runs would repeat the same no-op
        const after = this.buffer.cursor;
        if (
          this.buffer.getText() === text &&
          after.line === cursor.line &&
          after.col === cursor.col
        ) {
          break;
        }
      }
      return { message, failed: false };
    }
    return this.macros.play(
      name,
      count,
      (name) => this.registers.read(name),
      this.feedKey
    );
  }

  /** Drops every in-flight command; used when new content is loaded. */
  resetState(): void {
    this.pendingKeys = [];
    this.insertSession = null;
    this.confirm = null;
    this.searchOperator = null;
    this.searchCount = undefined;
    this.commandRegisterPending = false;
    this.lastSelection = null;
    this.resumeAtLineEnd = false;
    this.changeInProgress = null;
    this.lastCommand = null;
    this.modes.toNormal();
    this.buffer.allowPastEnd = false;
  }
}
