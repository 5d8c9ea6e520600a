import type { LastSearch, Position, SearchDirection } from "./vim-types";
import type { SimulatorOptions } from "./vim-options";
import { comparePositions, isWordChar } from "./vim-utils";

export interface CompiledPattern {
  source: string;
  /** Set by `\c` (true) or `\C` (false) inside the pattern. */
  ignoreCase: boolean | null;
}

export interface SearchMatch {
  line: number;
  col: number;
  length: number;
}

export interface SubstituteFlags {
  global: boolean;
  confirm: boolean;
  /** `i` / `I` flags; null follows the options. */
  ignoreCase: boolean | null;
}

export interface PlannedReplacement extends SearchMatch {
  replacement: string;
}

export interface SubstitutionResult {
  lines: string[];
  substitutions: number;
  linesChanged: number;
  /** Line of the last replacement in the new text, or null when none applied. */
  lastLine: number | null;
}

const MAX_PATTERN_LENGTH = 10_000;

const CLASS_ESCAPES: Record<string, string> = {
  a: "[A-Za-z]",
  A: "[^A-Za-z]",
  l: "[a-z]",
  L: "[^a-z]",
  u: "[A-Z]",
  U: "[^A-Z]",
  x: "[0-9A-Fa-f]",
  X: "[^0-9A-Fa-f]",
  h: "[A-Za-z_]",
  H: "[^A-Za-z_]",
  s: "[ \\t]",
  S: "[^ \\t]",
  d: "\\d",
  D: "\\D",
  w: "\\w",
  W: "\\W",
  t: "\\t",
  n: "\\n",
  e: "\\x1b",
};

export function escapeRegex(pattern: string): string {
  return pattern.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/** Reads a `[...]` collection starting at `start`; returns its end index or -1. */
function collectionEnd(pattern: string, start: number): number {
  let i = start + 1;
  if (pattern[i] === "^") i++;
  if (pattern[i] === "]") i++;
  while (i < pattern.length) {
    if (pattern[i] === "\\") {
      i += 2;
      continue;
    }
    if (pattern[i] === "]") return i;
    i++;
  }
  return -1;
}

function braceQuantifier(body: string): string {
  const lazy = body.startsWith("-");
  const range = lazy ? body.slice(1) : body;
  let quantifier: string;
  if (range === "") quantifier = "*";
  else if (/^\d+$/.test(range)) quantifier = `{${range}}`;
  else if (/^\d*,\d*$/.test(range)) {
    const [min, max] = range.split(",");
    quantifier = `{${min || "0"},${max}}`;
  } else {
    quantifier = `\\{${body}\\}`;
  }
  return lazy ? `${quantifier}?` : quantifier;
}

/**
 * Translates a vi pattern to a JavaScript regex source. "magic" is the
 * default dialect; a leading `\v` switches to "very magic", where the
 * special characters need no backslash.
 */
export function vimToJsRegex(pattern: string): CompiledPattern {
  let ignoreCase: boolean | null = null;
  let veryMagic = false;
  let out = "";

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];

    if (ch === "\\") {
      const next = pattern[i + 1];
      i++;
      if (next === undefined) {
        out += "\\\\";
        break;
      }
      if (next === "v") {
        veryMagic = true;
        continue;
      }
      if (next === "m" || next === "M") {
        veryMagic = false;
        continue;
      }
      if (next === "c" || next === "C") {
        ignoreCase = next === "c";
        continue;
      }
      if (veryMagic) {
        out += CLASS_ESCAPES[next] ?? escapeRegex(next);
        continue;
      }
      switch (next) {
        case "(":
        case ")":
        case "|":
        case "+":
          out += next;
          continue;
        case "?":
        case "=":
          out += "?";
          continue;
        case "<":
        case ">":
          out += "\\b";
          continue;
        case "{": {
          const close = pattern.indexOf("}", i + 1);
          if (close === -1) {
            out += "\\{";
            continue;
          }
          let body = pattern.slice(i + 1, close);
          if (body.endsWith("\\")) body = body.slice(0, -1);
          out += braceQuantifier(body);
          i = close;
          continue;
        }
        default:
          out += CLASS_ESCAPES[next] ?? escapeRegex(next);
          continue;
      }
    }

    if (ch === "[") {
      const end = collectionEnd(pattern, i);
      if (end === -1) {
        out += "\\[";
        continue;
      }
      const body = pattern.slice(i + 1, end).replace(/^(\^?)\]/, "$1\\]");
      out += `[${body}]`;
      i = end;
      continue;
    }

    if (veryMagic) {
      if (ch === "<" || ch === ">") out += "\\b";
      else if (ch === "=") out += "?";
      else if (ch === "/") out += "\\/";
      else out += ch;
      continue;
    }

    if ("()|+?{}/".includes(ch)) {
      out += `\\${ch}`;
    } else {
      out += ch;
    }
  }

  return { source: out, ignoreCase };
}

/** Builds a regex; an invalid pattern falls back to a literal match. */
export function buildSafeRegex(source: string, flags: string): RegExp | null {
  if (source.length > MAX_PATTERN_LENGTH) {
    console.warn(
      `[VimEngine] Skipping regex build: pattern too long (${source.length} chars)`
    );
    return null;
  }
  try {
    return new RegExp(source, flags);
  } catch (firstError) {
    console.warn(
      `[VimEngine] Invalid pattern, matching literally: "${source.slice(0, 200)}"`,
      firstError
    );
    return new RegExp(escapeRegex(source), flags);
  }
}

type CaseMode = "upper" | "lower" | null;

/** Expands `&`, `\0`-`\9`, case escapes and line breaks in a `:s` replacement. */
export function renderReplacement(
  template: string,
  match: string,
  groups: readonly (string | undefined)[]
): string {
  let out = "";
  let globalCase: CaseMode = null;
  let onceCase: CaseMode = null;

  const applyCase = (segment: string): string => {
    if (!segment) return segment;

    if (onceCase) {
      const first = segment[0];
      const rest = segment.slice(1);
      const applyRest =
        globalCase === "upper"
          ? rest.toUpperCase()
          : globalCase === "lower"
          ? rest.toLowerCase()
          : rest;
      const appliedFirst =
        onceCase === "upper" ? first.toUpperCase() : first.toLowerCase();
      onceCase = null;
      return appliedFirst + applyRest;
    }

    if (globalCase === "upper") return segment.toUpperCase();
    if (globalCase === "lower") return segment.toLowerCase();
    return segment;
  };

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];

    if (ch === "\\") {
      const next = template[i + 1];
      if (next === undefined) {
        out += applyCase("\\");
        continue;
      }
      i++;

      if (/\d/.test(next)) {
        const idx = Number(next);
        out += applyCase(idx === 0 ? match : groups[idx - 1] ?? "");
        continue;
      }

      switch (next) {
        case "U":
          globalCase = "upper";
          continue;
        case "L":
          globalCase = "lower";
          continue;
        case "E":
        case "e":
          globalCase = null;
          continue;
        case "u":
          onceCase = "upper";
          continue;
        case "l":
          onceCase = "lower";
          continue;
        case "r":
        case "n":
          out += "\n";
          continue;
        case "t":
          out += applyCase("\t");
          continue;
        default:
          out += applyCase(next);
          continue;
      }
    }

    if (ch === "&") {
      out += applyCase(match);
      continue;
    }

    out += applyCase(ch);
  }

  return out;
}

export function lineMatches(line: string, regex: RegExp): SearchMatch[] {
  const matches: SearchMatch[] = [];
  const global = new RegExp(regex.source, regex.flags.includes("g") ? regex.flags : `${regex.flags}g`);
  let match: RegExpExecArray | null;
  while ((match = global.exec(line)) !== null) {
    matches.push({ line: -1, col: match.index, length: match[0].length });
    if (match[0].length === 0) global.lastIndex++;
  }
  return matches;
}

/**
 * Pattern search with the editor's last-search memory (`n`, `N`, `*`, `#`,
 * empty patterns) and wrap-around.
 */
export class SearchEngine {
  private last: LastSearch | null = null;
  /** True when the most recent search wrapped around the buffer end. */
  lastWrapped = false;
  highlight = true;

  constructor(private readonly options: SimulatorOptions) {}

  get lastSearch(): LastSearch | null {
    return this.last ? { ...this.last } : null;
  }

  setLastSearch(search: LastSearch | null): void {
    this.last = search ? { ...search } : null;
  }

  /** Falls back to the last pattern when `pattern` is empty. */
  resolvePattern(pattern: string): string | null {
    if (pattern !== "") return pattern;
    return this.last ? this.last.pattern : null;
  }

  compile(pattern: string, ignoreCaseFlag: boolean | null = null): RegExp | null {
    const compiled = vimToJsRegex(pattern);
    const ignoreCase =
      compiled.ignoreCase ?? ignoreCaseFlag ?? this.defaultIgnoreCase(pattern);
    return buildSafeRegex(compiled.source, ignoreCase ? "gi" : "g");
  }

  search(
    lines: readonly string[],
    pattern: string,
    direction: SearchDirection,
    from: Position,
    count = 1
  ): Position | null {
    const resolved = this.resolvePattern(pattern);
    if (resolved === null) return null;
    this.last = { pattern: resolved, direction };
    this.highlight = true;
    return this.find(lines, resolved, direction, from, count);
  }

  repeatNext(lines: readonly string[], from: Position, count = 1): Position | null {
    if (!this.last) return null;
    this.highlight = true;
    return this.find(lines, this.last.pattern, this.last.direction, from, count);
  }

  repeatPrevious(lines: readonly string[], from: Position, count = 1): Position | null {
    if (!this.last) return null;
    const reversed: SearchDirection =
      this.last.direction === "forward" ? "backward" : "forward";
    this.highlight = true;
    return this.find(lines, this.last.pattern, reversed, from, count);
  }

  /** `*` / `#`: the keyword under or after the cursor as a whole word. */
  searchWordUnderCursor(
    lines: readonly string[],
    cursor: Position,
    direction: SearchDirection,
    count = 1
  ): { pattern: string; pos: Position | null } | null {
    const line = lines[cursor.line];
    let start = cursor.col;
    while (start < line.length && !isWordChar(line[start])) start++;
    if (start >= line.length) return null;
    while (start > 0 && isWordChar(line[start - 1])) start--;
    let end = start;
    while (end < line.length && isWordChar(line[end])) end++;

    const pattern = `\\<${line.slice(start, end)}\\>`;
    this.last = { pattern, direction };
    this.highlight = true;
    const from = direction === "backward" ? { line: cursor.line, col: start } : cursor;
    return { pattern, pos: this.find(lines, pattern, direction, from, count) };
  }

  /** Every replacement `:s` would make over `first..last`, on the original text. */
  planSubstitution(
    lines: readonly string[],
    first: number,
    last: number,
    pattern: string,
    replacement: string,
    flags: SubstituteFlags
  ): PlannedReplacement[] | null {
    const resolved = this.resolvePattern(pattern);
    if (resolved === null) return null;
    this.last = { pattern: resolved, direction: this.last?.direction ?? "forward" };
    const regex = this.compile(resolved, flags.ignoreCase);
    if (!regex) return null;

    const planned: PlannedReplacement[] = [];
    for (let l = first; l <= last; l++) {
      const line = lines[l];
      const global = new RegExp(regex.source, regex.flags);
      let match: RegExpExecArray | null;
      while ((match = global.exec(line)) !== null) {
        planned.push({
          line: l,
          col: match.index,
          length: match[0].length,
          replacement: renderReplacement(replacement, match[0], match.slice(1)),
        });
        if (!flags.global) break;
        if (match[0].length === 0) global.lastIndex++;
      }
    }
    return planned;
  }

  private defaultIgnoreCase(pattern: string): boolean {
    if (!this.options.ignorecase) return false;
    if (this.options.smartcase && /[A-Z]/.test(pattern.replace(/\\./g, ""))) {
      return false;
    }
    return true;
  }

  private find(
    lines: readonly string[],
    pattern: string,
    direction: SearchDirection,
    from: Position,
    count: number
  ): Position | null {
    const regex = this.compile(pattern);
    if (!regex) return null;

    const all: Position[] = [];
    lines.forEach((line, l) => {
      for (const m of lineMatches(line, regex)) all.push({ line: l, col: m.col });
    });
    if (all.length === 0) return null;

    this.lastWrapped = false;
    let steps = Math.max(1, count);
    // Past the first match, steps cycle through every match
    if (this.options.wrapscan && steps > all.length + 1) {
      steps = 1 + ((steps - 1) % all.length);
      this.lastWrapped = true;
    }
    let pos = from;
    for (let i = 0; i < steps; i++) {
      const next = this.step(all, pos, direction);
      if (!next) return null;
      pos = next;
    }
    return pos;
  }

  private step(
    all: readonly Position[],
    from: Position,
    direction: SearchDirection
  ): Position | null {
    if (direction === "forward") {
      const next = all.find((p) => comparePositions(p, from) > 0);
      if (next) return next;
      if (!this.options.wrapscan) return null;
      this.lastWrapped = true;
      return all[0];
    }
    for (let i = all.length - 1; i >= 0; i--) {
      if (comparePositions(all[i], from) < 0) return all[i];
    }
    if (!this.options.wrapscan) return null;
    this.lastWrapped = true;
    return all[all.length - 1];
  }
}

/**
 * Applies accepted replacements (computed on the original lines) right to
 * left within each line; replacement line breaks split the line.
 */
export function applySubstitution(
  lines: readonly string[],
  accepted: readonly PlannedReplacement[]
): SubstitutionResult {
  const byLine = new Map<number, PlannedReplacement[]>();
  for (const r of accepted) {
    const list = byLine.get(r.line) ?? [];
    list.push(r);
    byLine.set(r.line, list);
  }

  const out: string[] = [];
  let lastLine: number | null = null;
  lines.forEach((line, l) => {
    const replacements = byLine.get(l);
    if (!replacements) {
      out.push(line);
      return;
    }
    let text = line;
    const ordered = [...replacements].sort((a, b) => b.col - a.col);
    for (const r of ordered) {
      text = text.slice(0, r.col) + r.replacement + text.slice(r.col + r.length);
    }
    const parts = text.split("\n");
    out.push(...parts);
    lastLine = out.length - 1;
  });

  return {
    lines: out.length > 0 ? out : [""],
    substitutions: accepted.length,
    linesChanged: byLine.size,
    lastLine,
  };
}
