import type { HistoryEntry } from "./vim-types";

export interface HistoryTarget {
  snapshot(): HistoryEntry;
  restore(entry: HistoryEntry): void;
}

function sameContent(a: HistoryEntry, b: HistoryEntry): boolean {
  if (a.lines.length !== b.lines.length) return false;
  return a.lines.every((line, i) => line === b.lines[i]);
}

/**
 * Bounded undo/redo over full buffer snapshots. A snapshot is taken before
 * each change; undo swaps it with the current state.
 */
export class HistoryManager {
  private undoStack: HistoryEntry[] = [];
  private redoStack: HistoryEntry[] = [];

  constructor(
    private readonly target: HistoryTarget,
    private limit = 100
  ) {}

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  setLimit(limit: number): void {
    this.limit = Math.max(1, limit);
    this.trim(this.undoStack);
    this.trim(this.redoStack);
  }

  snapshotBeforeChange(): void {
    this.undoStack.push(this.target.snapshot());
    this.trim(this.undoStack);
    this.redoStack = [];
  }

  /** Drops the newest snapshot when the change it guarded left the text alone. */
  discardLastIfUnchanged(): boolean {
    const last = this.undoStack[this.undoStack.length - 1];
    if (!last || !sameContent(last, this.target.snapshot())) return false;
    this.undoStack.pop();
    return true;
  }

  undo(): boolean {
    const entry = this.undoStack.pop();
    if (!entry) return false;
    this.redoStack.push(this.target.snapshot());
    this.trim(this.redoStack);
    this.target.restore(entry);
    return true;
  }

  redo(): boolean {
    const entry = this.redoStack.pop();
    if (!entry) return false;
    this.undoStack.push(this.target.snapshot());
    this.trim(this.undoStack);
    this.target.restore(entry);
    return true;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }

  private trim(stack: HistoryEntry[]): void {
    if (stack.length > this.limit) {
      stack.splice(0, stack.length - this.limit);
    }
  }
}
