export interface SimulatorOptions {
  /** Undo levels kept before the oldest snapshot is evicted. */
  historyLimit: number;
  shiftwidth: number;
  autoindent: boolean;
  ignorecase: boolean;
  smartcase: boolean;
  wrapscan: boolean;
  /** Line and substitution counts above this produce a status message. */
  report: number;
  maxMacroDepth: number;
  maxMacroKeys: number;
}

const DEFAULT_SIMULATOR_OPTIONS: SimulatorOptions = {
  historyLimit: 100,
  shiftwidth: 2,
  autoindent: false,
  ignorecase: false,
  smartcase: false,
  wrapscan: true,
  report: 2,
  maxMacroDepth: 20,
  maxMacroKeys: 100_000,
};
export { DEFAULT_SIMULATOR_OPTIONS };

export function mergeOptions(
  options?: Partial<SimulatorOptions>
): SimulatorOptions {
  if (!options) {
    return { ...DEFAULT_SIMULATOR_OPTIONS };
  }
  return { ...DEFAULT_SIMULATOR_OPTIONS, ...options };
}

type BooleanOption = "autoindent" | "ignorecase" | "smartcase" | "wrapscan";
type NumberOption = "shiftwidth" | "report" | "historyLimit";

const BOOLEAN_OPTIONS = new Map<string, BooleanOption>([
  ["autoindent", "autoindent"],
  ["ai", "autoindent"],
  ["ignorecase", "ignorecase"],
  ["ic", "ignorecase"],
  ["smartcase", "smartcase"],
  ["scs", "smartcase"],
  ["wrapscan", "wrapscan"],
  ["ws", "wrapscan"],
]);

const NUMBER_OPTIONS = new Map<string, NumberOption>([
  ["shiftwidth", "shiftwidth"],
  ["sw", "shiftwidth"],
  ["report", "report"],
  ["undolevels", "historyLimit"],
  ["ul", "historyLimit"],
]);

const NUMBER_OPTION_NAMES: Record<NumberOption, string> = {
  shiftwidth: "shiftwidth",
  report: "report",
  historyLimit: "undolevels",
};

/**
 * Applies one `:set` argument (`ic`, `noic`, `sw=4`, `ic?`) in place.
 * Returns the status message to show, or an error message for unknown names.
 */
export function applySetArgument(
  options: SimulatorOptions,
  arg: string
): { ok: boolean; message: string | null } {
  const query = arg.endsWith("?");
  const body = query ? arg.slice(0, -1) : arg;

  const assign = body.match(/^([a-z]+)=(\d+)$/);
  if (assign) {
    const key = NUMBER_OPTIONS.get(assign[1]);
    if (!key) return { ok: false, message: `E518: Unknown option: ${assign[1]}` };
    options[key] = parseInt(assign[2], 10);
    return { ok: true, message: null };
  }

  const numberKey = NUMBER_OPTIONS.get(body);
  if (numberKey) {
    return {
      ok: true,
      message: `  ${NUMBER_OPTION_NAMES[numberKey]}=${options[numberKey]}`,
    };
  }

  const negate = body.startsWith("no") && BOOLEAN_OPTIONS.has(body.slice(2));
  const name = negate ? body.slice(2) : body;
  const key = BOOLEAN_OPTIONS.get(name);
  if (!key) return { ok: false, message: `E518: Unknown option: ${body}` };

  if (query) {
    return { ok: true, message: `${options[key] ? "  " : "no"}${key}` };
  }
  options[key] = !negate;
  return { ok: true, message: null };
}
