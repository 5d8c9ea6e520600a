import type { TextBuffer } from "./vim-buffer";
import type { HistoryManager } from "./vim-history";
import { applySetArgument, type SimulatorOptions } from "./vim-options";
import { isValidRegister, type RegisterStore } from "./vim-registers";
import {
  applySubstitution,
  type PlannedReplacement,
  type SearchEngine,
  type SubstituteFlags,
} from "./vim-search";
import { firstNonBlank } from "./vim-utils";

/** What `:` commands need from the editor that runs them. */
export interface ExHost {
  readonly buffer: TextBuffer;
  readonly registers: RegisterStore;
  readonly search: SearchEngine;
  readonly options: SimulatorOptions;
  readonly history: HistoryManager;
  /** Lines of the last visual selection (`'<` and `'>`), if any. */
  visualLineRange(): LineRange | null;
  undo(count: number): string | null;
  redo(count: number): string | null;
}

export interface LineRange {
  start: number;
  end: number;
}

export interface SubstituteConfirm {
  planned: PlannedReplacement[];
  index: number;
  accepted: PlannedReplacement[];
}

export interface ExResult {
  message: string | null;
  /** Set when `:s///c` is waiting for y/n/a/q/l answers. */
  confirm?: SubstituteConfirm;
}

interface LastSubstitute {
  pattern: string;
  replacement: string;
}

const ADDRESS = String.raw`(?:\d+|[.$]|'[<>])?(?:[+-]\d*)*`;
const RANGE_RE = new RegExp(`^(%|${ADDRESS}(?:,${ADDRESS})?)`);

class ExRangeError extends Error {}

function parseAddress(
  address: string,
  host: ExHost,
  base: number
): number {
  const buffer = host.buffer;
  const match = address.match(/^(\d+|[.$]|'[<>])?((?:[+-]\d*)*)$/);
  if (!match) throw new ExRangeError("E16: Invalid range");
  const [, head, offsets] = match;

  let line: number;
  if (head === undefined) {
    line = base;
  } else if (head === ".") {
    line = buffer.cursor.line;
  } else if (head === "$") {
    line = buffer.lineCount() - 1;
  } else if (head === "'<" || head === "'>") {
    const marks = host.visualLineRange();
    if (!marks) throw new ExRangeError("E20: Mark not set");
    line = head === "'<" ? marks.start : marks.end;
  } else {
    line = parseInt(head, 10) - 1;
  }

  for (const offset of offsets.match(/[+-]\d*/g) ?? []) {
    const amount = offset.length > 1 ? parseInt(offset.slice(1), 10) : 1;
    line += offset[0] === "+" ? amount : -amount;
  }
  return line;
}

/** Splits `text` into its line range and the command after it. */
export function parseCommandRange(
  text: string,
  host: ExHost
): { range: LineRange; explicit: boolean; rest: string } {
  const match = text.match(RANGE_RE);
  const rangeText = match ? match[1] : "";
  const rest = text.slice(rangeText.length).trimStart();
  const cursorLine = host.buffer.cursor.line;

  if (rangeText === "") {
    return { range: { start: cursorLine, end: cursorLine }, explicit: false, rest };
  }
  if (rangeText === "%") {
    return {
      range: { start: 0, end: host.buffer.lineCount() - 1 },
      explicit: true,
      rest,
    };
  }

  const [first, second] = rangeText.split(",");
  const start = parseAddress(first, host, cursorLine);
  const end = second === undefined ? start : parseAddress(second, host, cursorLine);
  return { range: { start, end }, explicit: true, rest };
}

/** Reads up to the next unescaped `delimiter`; an escaped delimiter loses its backslash. */
function readUntilDelimiter(
  input: string,
  delimiter: string
): { part: string; remaining: string | null } {
  let part = "";
  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === "\\" && i + 1 < input.length) {
      const next = input[i + 1];
      part += next === delimiter ? delimiter : ch + next;
      i += 2;
      continue;
    }
    if (ch === delimiter) {
      return { part, remaining: input.slice(i + 1) };
    }
    part += ch;
    i += 1;
  }
  return { part, remaining: null };
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function moveToLine(host: ExHost, line: number): void {
  const target = Math.max(0, Math.min(line, host.buffer.lineCount() - 1));
  const text = host.buffer.getLine(target);
  host.buffer.placeCursor({ line: target, col: firstNonBlank(text) });
}

function registerArgument(arg: string): string | undefined | null {
  const name = arg.trim();
  if (name === "") return undefined;
  return name.length === 1 && isValidRegister(name) ? name : null;
}

function displayRegisterText(text: string, linewise: boolean): string {
  const shown = (linewise ? `${text}\n` : text)
    .replace(/\n/g, "^J")
    .replace(/\t/g, "^I");
  return shown.length > 60 ? shown.slice(0, 60) : shown;
}

/**
 * Runs one `:` command line (without the colon). Errors come back as
 * messages; nothing here throws for bad input.
 */
export class ExCommandRunner {
  private lastSubstitute: LastSubstitute | null = null;
  private lastCommand: string | null = null;

  get previousCommand(): string | null {
    return this.lastCommand;
  }

  execute(text: string, host: ExHost): ExResult {
    const trimmed = text.trim();
    if (trimmed === "") return { message: null };
    this.lastCommand = trimmed;

    let parsed: ReturnType<typeof parseCommandRange>;
    try {
      parsed = parseCommandRange(trimmed, host);
    } catch (err) {
      if (err instanceof ExRangeError) return { message: err.message };
      throw err;
    }
    const { range, rest } = parsed;

    const lastLine = host.buffer.lineCount() - 1;
    if (rest === "") {
      // `:N` jumps to a line; past the end means the last line
      moveToLine(host, range.end);
      return { message: null };
    }

    if (range.start > range.end) {
      [range.start, range.end] = [range.end, range.start];
    }
    if (range.start < 0 || range.end > lastLine) {
      return { message: "E16: Invalid range" };
    }

    const command = rest.match(/^([a-zA-Z]+|[&<>])(!?)\s*(.*)$/);
    if (!command) return { message: `E492: Not an editor command: ${trimmed}` };
    const [, name, , args] = command;

    if (/^s(u(b(s(t(i(t(u(te?)?)?)?)?)?)?)?)?$/.test(name) || name === "&") {
      return this.substitute(rest.slice(name.length), range, host);
    }
    if (/^d(e(l(e(te?)?)?)?)?$/.test(name)) {
      return this.deleteLines(range, args, host);
    }
    if (/^y(a(nk?)?)?$/.test(name)) {
      return this.yankLines(range, args, host);
    }
    if (/^se(t)?$/.test(name)) {
      return this.set(args, host);
    }
    if (/^u(n(do?)?)?$/.test(name)) {
      return { message: host.undo(1) };
    }
    if (/^red(o)?$/.test(name)) {
      return { message: host.redo(1) };
    }
    if (/^noh(l(s(e(a(r(ch?)?)?)?)?)?)?$/.test(name)) {
      host.search.highlight = false;
      return { message: null };
    }
    if (/^(reg(i(s(t(e(rs?)?)?)?)?)?|di(s(p(l(ay?)?)?)?)?)$/.test(name)) {
      return { message: this.listRegisters(host) };
    }

    return { message: `E492: Not an editor command: ${trimmed}` };
  }

  private substitute(body: string, range: LineRange, host: ExHost): ExResult {
    let pattern: string;
    let replacement: string;
    let flagText = "";

    const delimiter = body[0];
    if (delimiter === undefined || /[\s&a-zA-Z0-9"|\\]/.test(delimiter)) {
      // `:s` or `:&` alone repeats the last substitute on the range
      if (!this.lastSubstitute) return { message: "E35: No previous regular expression" };
      pattern = this.lastSubstitute.pattern;
      replacement = this.lastSubstitute.replacement;
      flagText = body.replace(/^&/, "").trim();
    } else {
      const first = readUntilDelimiter(body.slice(1), delimiter);
      pattern = first.part;
      if (first.remaining === null) {
        replacement = "";
      } else {
        const second = readUntilDelimiter(first.remaining, delimiter);
        replacement = second.part;
        flagText = (second.remaining ?? "").trim();
      }
    }

    const resolved = host.search.resolvePattern(pattern);
    if (resolved === null) return { message: "E35: No previous regular expression" };
    this.lastSubstitute = { pattern: resolved, replacement };

    const flags: SubstituteFlags = {
      global: flagText.includes("g"),
      confirm: flagText.includes("c"),
      ignoreCase: flagText.includes("I") ? false : flagText.includes("i") ? true : null,
    };

    const planned = host.search.planSubstitution(
      host.buffer.view(),
      range.start,
      range.end,
      resolved,
      replacement,
      flags
    );
    if (!planned || planned.length === 0) {
      return { message: `E486: Pattern not found: ${resolved}` };
    }

    if (flags.confirm) {
      return {
        message: confirmPrompt(planned[0]),
        confirm: { planned, index: 0, accepted: [] },
      };
    }
    return { message: applyPlannedSubstitution(host, planned) };
  }

  private deleteLines(range: LineRange, args: string, host: ExHost): ExResult {
    const register = registerArgument(args);
    if (register === null) return { message: "E488: Trailing characters" };

    host.history.snapshotBeforeChange();
    const removed = host.buffer.deleteLines(range.start, range.end);
    host.registers.delete(removed.join("\n"), register, true);
    moveToLine(host, range.start);

    return {
      message:
        removed.length > host.options.report ? `${removed.length} fewer lines` : null,
    };
  }

  private yankLines(range: LineRange, args: string, host: ExHost): ExResult {
    const register = registerArgument(args);
    if (register === null) return { message: "E488: Trailing characters" };

    const lines = host.buffer.getLines().slice(range.start, range.end + 1);
    host.registers.yank(lines.join("\n"), register, true);
    return {
      message:
        lines.length > host.options.report ? `${lines.length} lines yanked` : null,
    };
  }

  private set(args: string, host: ExHost): ExResult {
    const messages: string[] = [];
    for (const arg of args.split(/\s+/).filter(Boolean)) {
      const result = applySetArgument(host.options, arg);
      if (!result.ok) return { message: result.message };
      if (result.message) messages.push(result.message);
    }
    host.history.setLimit(host.options.historyLimit);
    return { message: messages.length > 0 ? messages.join("\n") : null };
  }

  private listRegisters(host: ExHost): string {
    const rows = host.registers
      .list()
      .map(([name, entry]) => `"${name}   ${displayRegisterText(entry.text, entry.linewise)}`);
    return ["--- Registers ---", ...rows].join("\n");
  }
}

export function confirmPrompt(next: PlannedReplacement): string {
  const shown = next.replacement.replace(/\n/g, "^M");
  return `replace with ${shown} (y/n/a/q/l)?`;
}

/**
 * Writes `accepted` replacements into the buffer as one undo step and returns
 * the status message.
 */
export function applyPlannedSubstitution(
  host: ExHost,
  accepted: readonly PlannedReplacement[]
): string | null {
  if (accepted.length === 0) return null;

  host.history.snapshotBeforeChange();
  const result = applySubstitution(host.buffer.view(), accepted);
  host.buffer.restore({ lines: result.lines, cursor: host.buffer.cursor });
  if (result.lastLine !== null) moveToLine(host, result.lastLine);
  host.history.discardLastIfUnchanged();

  if (result.substitutions > host.options.report) {
    return `${plural(result.substitutions, "substitution")} on ${plural(
      result.linesChanged,
      "line"
    )}`;
  }
  return null;
}
