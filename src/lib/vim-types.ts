export interface Position {
  line: number;
  col: number;
}

export type VisualKind = "char" | "line" | "block";

export type CommandPrompt = ":" | "/" | "?";

export type SearchDirection = "forward" | "backward";

export type FindDirection = "f" | "F" | "t" | "T";

export type VimMode =
  | "normal"
  | "insert"
  | "replace"
  | "visual"
  | "visual-line"
  | "visual-block"
  | "command";

export type ModeState =
  | { kind: "normal" }
  | { kind: "insert" }
  | { kind: "replace" }
  | { kind: "visual"; visual: VisualKind; anchor: Position }
  | { kind: "command"; prompt: CommandPrompt; text: string };

/**
 * Motions the text buffer can resolve on its own. `word` and `WORD` variants
 * are separate tags: text objects reuse the same boundary classes.
 */
export type BufferMotion =
  | { kind: "left" }
  | { kind: "right" }
  | { kind: "up" }
  | { kind: "down" }
  | { kind: "wordForward" }
  | { kind: "WORDForward" }
  | { kind: "wordBack" }
  | { kind: "WORDBack" }
  | { kind: "wordEnd" }
  | { kind: "WORDEnd" }
  | { kind: "lineStart" }
  | { kind: "lineFirstNonBlank" }
  | { kind: "lineEnd" }
  | { kind: "lineLastNonBlank" }
  | { kind: "fileStart" }
  | { kind: "fileEnd" }
  | { kind: "toLine"; line: number }
  | { kind: "findChar"; char: string; direction: FindDirection }
  | { kind: "repeatFind" }
  | { kind: "repeatFindReverse" }
  | { kind: "paragraphForward" }
  | { kind: "paragraphBack" }
  | { kind: "matchPair" };

export type SearchMotion =
  | { kind: "searchNext" }
  | { kind: "searchPrevious" }
  | { kind: "searchWord"; direction: SearchDirection };

export type Motion = BufferMotion | SearchMotion;

export interface MotionTarget {
  pos: Position;
  linewise: boolean;
  inclusive: boolean;
}

export type QuoteChar = '"' | "'" | "`";
export type OpenBracket = "(" | "[" | "{" | "<";

export type TextObject =
  | { kind: "word"; around: boolean }
  | { kind: "WORD"; around: boolean }
  | { kind: "paragraph"; around: boolean }
  | { kind: "quote"; around: boolean; quote: QuoteChar }
  | { kind: "bracket"; around: boolean; open: OpenBracket };

export interface TextRange {
  start: Position;
  /** Inclusive. */
  end: Position;
  linewise: boolean;
}

export type Operator =
  | "delete"
  | "yank"
  | "change"
  | "indent"
  | "outdent"
  | "lowercase"
  | "uppercase"
  | "toggleCase";

export type OperatorTarget =
  | { kind: "motion"; motion: Motion }
  | { kind: "textObject"; object: TextObject }
  | { kind: "lines" }
  | { kind: "selection"; forceLinewise: boolean }
  | { kind: "searchPrompt"; prompt: "/" | "?" };

export type InsertEntry =
  | "before"
  | "after"
  | "lineStart"
  | "lineEnd"
  | "openBelow"
  | "openAbove";

export type Action =
  | { kind: "escape" }
  | { kind: "put"; before: boolean }
  | { kind: "undo" }
  | { kind: "redo" }
  | { kind: "joinLines" }
  | { kind: "toggleCaseChar" }
  | { kind: "replaceChar"; char: string }
  | { kind: "insert"; entry: InsertEntry }
  | { kind: "replaceMode" }
  | { kind: "visual"; visual: VisualKind }
  | { kind: "commandLine"; prompt: CommandPrompt }
  | { kind: "startRecording"; register: string }
  | { kind: "stopRecording" }
  | { kind: "playMacro"; register: string }
  | { kind: "repeatLastChange" }
  | { kind: "swapSelectionEnds" }
  | { kind: "selectTextObject"; object: TextObject }
  | { kind: "blockInsert"; append: boolean };

export type ParsedCommand =
  | { kind: "move"; motion: Motion; count?: number }
  | {
      kind: "operate";
      operator: Operator;
      target: OperatorTarget;
      count?: number;
      register?: string;
    }
  | { kind: "action"; action: Action; count?: number; register?: string };

export interface RegisterEntry {
  text: string;
  linewise: boolean;
}

export interface HistoryEntry {
  readonly lines: readonly string[];
  readonly cursor: Readonly<Position>;
}

export interface EditorOutcome {
  mode: VimMode;
  cursorPos: Position;
  linesSnapshot: string[];
  bufferChanged: boolean;
  statusMessage: string | null;
  /** Keys of a command still waiting for more input ("" when none). */
  pending: string;
}

export interface Selection {
  kind: VisualKind;
  start: Position;
  end: Position;
}

export interface DisplayState {
  lines: string[];
  cursorPos: Position;
  mode: VimMode;
  lastCommand: string | null;
  commandLine: string | null;
  selection: Selection | null;
  recording: string | null;
  pending: string;
}

export interface ReplayStep {
  keystroke: string;
  text: string;
  cursorLine: number;
  cursorCol: number;
  mode: VimMode;
  commandLine: string | null;
}

export interface LastSearch {
  pattern: string;
  direction: SearchDirection;
}

export interface SerializedState {
  version: 1;
  lines: string[];
  cursor: Position;
  mode: VimMode;
  visualAnchor: Position | null;
  commandLine: string | null;
  registers: Record<string, RegisterEntry>;
  lastSearch: LastSearch | null;
}
