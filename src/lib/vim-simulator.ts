/**
 * Deterministic vi simulator: one instance per editing session. Every key,
 * typed or replayed from a macro, goes through the same input path.
 */

import { z } from "zod";
import type {
  DisplayState,
  EditorOutcome,
  ModeState,
  ReplayStep,
  SerializedState,
  VimMode,
} from "./vim-types";
import { TextBuffer } from "./vim-buffer";
import { SimulatorContractError } from "./vim-errors";
import { HistoryManager } from "./vim-history";
import { CommandInterpreter, type KeyResult } from "./vim-interpreter";
import { normalizeKey, tokenizeKeystrokes } from "./vim-keys";
import { MacroRecorder } from "./vim-macros";
import { ModeStateMachine } from "./vim-modes";
import { mergeOptions, type SimulatorOptions } from "./vim-options";
import { RegisterStore } from "./vim-registers";
import { SearchEngine } from "./vim-search";

const positionSchema = z.object({
  line: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
});

const serializedStateSchema = z.object({
  version: z.literal(1),
  lines: z
    .array(z.string().refine((line) => !line.includes("\n"), "line contains a newline"))
    .min(1),
  cursor: positionSchema,
  mode: z.enum([
    "normal",
    "insert",
    "replace",
    "visual",
    "visual-line",
    "visual-block",
    "command",
  ]),
  visualAnchor: positionSchema.nullable(),
  commandLine: z.string().nullable(),
  registers: z.record(z.object({ text: z.string(), linewise: z.boolean() })),
  lastSearch: z
    .object({ pattern: z.string(), direction: z.enum(["forward", "backward"]) })
    .nullable(),
});

type ParsedState = z.infer<typeof serializedStateSchema>;

function restoredMode(state: ParsedState): ModeState {
  switch (state.mode) {
    case "normal":
      return { kind: "normal" };
    case "insert":
      return { kind: "insert" };
    case "replace":
      return { kind: "replace" };
    case "visual":
    case "visual-line":
    case "visual-block": {
      const anchor = state.visualAnchor;
      if (!anchor || anchor.line >= state.lines.length) {
        throw new SimulatorContractError("visual mode needs a valid visualAnchor", {
          visualAnchor: anchor,
        });
      }
      const visual =
        state.mode === "visual" ? "char" : state.mode === "visual-line" ? "line" : "block";
      return { kind: "visual", visual, anchor };
    }
    case "command": {
      const line = state.commandLine ?? "";
      const prompt = line[0];
      if (prompt !== ":" && prompt !== "/" && prompt !== "?") {
        throw new SimulatorContractError("command mode needs a commandLine starting with : / or ?", {
          commandLine: state.commandLine,
        });
      }
      return { kind: "command", prompt, text: line.slice(1) };
    }
  }
}

export class VimSimulator {
  private readonly options: SimulatorOptions;
  private readonly buffer: TextBuffer;
  private readonly registers = new RegisterStore();
  private readonly search: SearchEngine;
  private readonly history: HistoryManager;
  private readonly modes = new ModeStateMachine();
  private readonly macros: MacroRecorder;
  private readonly interpreter: CommandInterpreter;
  private steps: ReplayStep[] = [];

  constructor(initialText = "", options?: Partial<SimulatorOptions>) {
    this.options = mergeOptions(options);
    this.buffer = new TextBuffer(initialText);
    this.search = new SearchEngine(this.options);
    this.history = new HistoryManager(this.buffer, this.options.historyLimit);
    this.macros = new MacroRecorder(this.options);
    this.interpreter = new CommandInterpreter(
      {
        buffer: this.buffer,
        registers: this.registers,
        search: this.search,
        history: this.history,
        modes: this.modes,
        macros: this.macros,
        options: this.options,
      },
      (token) => this.feed(token)
    );
    this.recordStep("START");
  }

  /** Feeds one key, or a whole key string (`dw`, `ihello<Esc>`), and reports the result. */
  processInput(input: string): EditorOutcome {
    if (typeof input !== "string") {
      throw new SimulatorContractError("processInput expects key text", {
        received: typeof input,
      });
    }
    const before = this.buffer.getText();
    let message: string | null = null;
    for (const token of tokenizeKeystrokes(input)) {
      const result = this.feed(token);
      if (result.message !== null) message = result.message;
    }
    return this.outcome(before, message);
  }

  /** Runs `keystrokes` and records one replay step per key. */
  executeKeystrokes(keystrokes: string): ReplayStep[] {
    return tokenizeKeystrokes(keystrokes).map((token) => this.executeKey(token));
  }

  /** Runs a single key token and records its replay step. */
  executeKey(token: string): ReplayStep {
    this.feed(token);
    return this.recordStep(normalizeKey(token));
  }

  loadContent(text: string): void {
    if (typeof text !== "string") {
      throw new SimulatorContractError("loadContent expects a string", {
        received: typeof text,
      });
    }
    this.buffer.setText(text);
    this.history.clear();
    this.interpreter.resetState();
    this.steps = [];
    this.recordStep("START");
  }

  getContent(): string {
    return this.buffer.getText();
  }

  getText(): string {
    return this.buffer.getText();
  }

  /** Fresh session on `text`: registers, search, macros and dot-repeat are cleared too. */
  reset(text = ""): void {
    this.macros.cancel();
    this.registers.clear();
    this.search.setLastSearch(null);
    this.interpreter.lastChange = null;
    this.loadContent(text);
  }

  getSteps(): ReplayStep[] {
    return [...this.steps];
  }

  getMode(): VimMode {
    return this.interpreter.mode;
  }

  getDisplayState(): DisplayState {
    return {
      lines: this.buffer.getLines(),
      cursorPos: this.buffer.cursor,
      mode: this.interpreter.mode,
      lastCommand: this.interpreter.lastCommand,
      commandLine: this.interpreter.commandLine,
      selection: this.interpreter.selection(),
      recording: this.macros.recording,
      pending: this.interpreter.pendingText,
    };
  }

  /** JSON-safe snapshot; undo history is not part of it. */
  serializeState(): SerializedState {
    return {
      version: 1,
      lines: this.buffer.getLines(),
      cursor: this.buffer.cursor,
      mode: this.modes.mode,
      visualAnchor: this.modes.visualAnchor,
      commandLine: this.modes.commandLine,
      registers: this.registers.snapshot(),
      lastSearch: this.search.lastSearch,
    };
  }

  deserializeState(state: unknown): void {
    const parsed = serializedStateSchema.safeParse(state);
    if (!parsed.success) {
      throw new SimulatorContractError("malformed simulator state", parsed.error.issues);
    }
    const data = parsed.data;
    const { line, col } = data.cursor;
    if (line >= data.lines.length || col > data.lines[line].length) {
      throw new SimulatorContractError("cursor outside the restored text", data.cursor);
    }
    const mode = restoredMode(data);

    this.interpreter.resetState();
    this.history.clear();
    this.macros.cancel();
    this.buffer.allowPastEnd = mode.kind === "insert" || mode.kind === "replace";
    this.buffer.restore({ lines: data.lines, cursor: data.cursor });
    this.modes.force(mode);
    this.registers.restore(data.registers);
    this.search.setLastSearch(data.lastSearch);
    this.steps = [];
    this.recordStep("START");
  }

  private feed(token: string): KeyResult {
    const key = normalizeKey(token);
    const recording = this.macros.recording;
    const result = this.interpreter.handleKey(key);
    if (recording !== null && this.macros.recording === recording) {
      this.macros.record(key);
    }
    return result;
  }

  private outcome(before: string, message: string | null): EditorOutcome {
    return {
      mode: this.interpreter.mode,
      cursorPos: this.buffer.cursor,
      linesSnapshot: this.buffer.getLines(),
      bufferChanged: this.buffer.getText() !== before,
      statusMessage: message,
      pending: this.interpreter.pendingText,
    };
  }

  private recordStep(keystroke: string): ReplayStep {
    const cursor = this.buffer.cursor;
    const step: ReplayStep = {
      keystroke,
      text: this.buffer.getText(),
      cursorLine: cursor.line,
      cursorCol: cursor.col,
      mode: this.interpreter.mode,
      commandLine: this.interpreter.commandLine,
    };
    this.steps.push(step);
    return step;
  }
}
