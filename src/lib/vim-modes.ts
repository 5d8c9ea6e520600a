import type {
  CommandPrompt,
  ModeState,
  Position,
  VimMode,
  VisualKind,
} from "./vim-types";

const VISUAL_MODES: Record<VisualKind, VimMode> = {
  char: "visual",
  line: "visual-line",
  block: "visual-block",
};

const TRANSITIONS: Record<VimMode, readonly VimMode[]> = {
  normal: ["insert", "replace", "visual", "visual-line", "visual-block", "command"],
  insert: ["normal"],
  replace: ["normal"],
  visual: ["visual-line", "visual-block", "insert", "command", "normal"],
  "visual-line": ["visual", "visual-block", "insert", "command", "normal"],
  "visual-block": ["visual", "visual-line", "insert", "command", "normal"],
  command: ["normal", "visual", "visual-line", "visual-block"],
};

export function modeName(state: ModeState): VimMode {
  if (state.kind === "visual") return VISUAL_MODES[state.visual];
  return state.kind;
}

export function canTransition(from: VimMode, to: VimMode): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

/**
 * Current mode plus the data that belongs to it (visual anchor, command
 * line). Illegal requests return false and leave the state alone.
 */
export class ModeStateMachine {
  private current: ModeState = { kind: "normal" };
  // A search started from visual mode returns to the same selection
  private suspendedVisual: { visual: VisualKind; anchor: Position } | null =
    null;

  get state(): ModeState {
    return this.current;
  }

  get mode(): VimMode {
    return modeName(this.current);
  }

  get visualAnchor(): Position | null {
    return this.current.kind === "visual" ? { ...this.current.anchor } : null;
  }

  get visualKind(): VisualKind | null {
    return this.current.kind === "visual" ? this.current.visual : null;
  }

  get commandLine(): string | null {
    if (this.current.kind !== "command") return null;
    return this.current.prompt + this.current.text;
  }

  get commandText(): string {
    return this.current.kind === "command" ? this.current.text : "";
  }

  get commandPrompt(): CommandPrompt | null {
    return this.current.kind === "command" ? this.current.prompt : null;
  }

  enterInsert(): boolean {
    return this.transition("insert", { kind: "insert" });
  }

  enterReplace(): boolean {
    return this.transition("replace", { kind: "replace" });
  }

  /** From normal the anchor is `anchor`; switching kinds keeps the old one. */
  enterVisual(visual: VisualKind, anchor: Position): boolean {
    const kept = this.current.kind === "visual" ? this.current.anchor : anchor;
    return this.transition(VISUAL_MODES[visual], {
      kind: "visual",
      visual,
      anchor: { ...kept },
    });
  }

  enterCommand(prompt: CommandPrompt, text = ""): boolean {
    const from = this.current;
    if (!this.transition("command", { kind: "command", prompt, text })) {
      return false;
    }
    this.suspendedVisual =
      from.kind === "visual" && prompt !== ":"
        ? { visual: from.visual, anchor: from.anchor }
        : null;
    return true;
  }

  setCommandText(text: string): boolean {
    if (this.current.kind !== "command") return false;
    this.current = { ...this.current, text };
    return true;
  }

  /** Leaves the command line for normal mode, or the visual mode it came from. */
  leaveCommand(): VimMode {
    const resume = this.suspendedVisual;
    this.suspendedVisual = null;
    if (this.current.kind === "command" && resume) {
      this.current = { kind: "visual", ...resume };
    } else {
      this.current = { kind: "normal" };
    }
    return this.mode;
  }

  /** Moves the anchor to `cursor` and returns the old anchor (visual `o`). */
  swapAnchor(cursor: Position): Position | null {
    if (this.current.kind !== "visual") return null;
    const previous = this.current.anchor;
    this.current = { ...this.current, anchor: { ...cursor } };
    return { ...previous };
  }

  /** Text-object selection: new anchor, and optionally a new visual kind. */
  reanchor(anchor: Position, visual?: VisualKind): boolean {
    if (this.current.kind !== "visual") return false;
    this.current = {
      kind: "visual",
      visual: visual ?? this.current.visual,
      anchor: { ...anchor },
    };
    return true;
  }

  toNormal(): void {
    this.suspendedVisual = null;
    this.current = { kind: "normal" };
  }

  /** Replaces the whole state (deserialization); bypasses the transition table. */
  force(state: ModeState): void {
    this.suspendedVisual = null;
    this.current = state;
  }

  private transition(to: VimMode, next: ModeState): boolean {
    if (!canTransition(this.mode, to)) return false;
    this.current = next;
    return true;
  }
}
