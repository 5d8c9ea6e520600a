import type { RegisterEntry } from "./vim-types";
import type { SimulatorOptions } from "./vim-options";
import { encodeKeys, tokenizeKeystrokes } from "./vim-keys";

export interface MacroOutcome {
  message: string | null;
  failed: boolean;
}

export interface RecordedMacro {
  register: string;
  keys: string;
}

/**
 * Records raw key tokens into a register and replays them. Playback feeds
 * keys back through the simulator's own input path; anything fed while a
 * macro plays is not recorded again.
 */
export class MacroRecorder {
  private register: string | null = null;
  private tokens: string[] = [];
  private depth = 0;
  private replayed = 0;
  private aborted = false;
  private lastPlayed: string | null = null;

  constructor(private readonly options: SimulatorOptions) {}

  get recording(): string | null {
    return this.register;
  }

  get playing(): boolean {
    return this.depth > 0;
  }

  get lastPlayedRegister(): string | null {
    return this.lastPlayed;
  }

  /** `@@` target for registers played outside `play` (`@:`). */
  markPlayed(register: string): void {
    this.lastPlayed = register;
  }

  startRecording(register: string): void {
    this.register = register;
    this.tokens = [];
  }

  /** Ends the recording and returns what the register should receive. */
  stopRecording(): RecordedMacro | null {
    const register = this.register;
    if (register === null) return null;
    const keys = encodeKeys(this.tokens);
    this.register = null;
    this.tokens = [];
    return { register, keys };
  }

  record(token: string): void {
    if (this.register === null || this.playing) return;
    this.tokens.push(token);
  }

  /** Drops an open recording without writing it anywhere. */
  cancel(): void {
    this.register = null;
    this.tokens = [];
  }

  play(
    register: string,
    count: number,
    read: (name: string) => RegisterEntry | null,
    feed: (token: string) => MacroOutcome
  ): MacroOutcome {
    let name = register;
    if (name === "@") {
      if (this.lastPlayed === null) {
        return { message: "E748: No previously used register", failed: true };
      }
      name = this.lastPlayed;
    }

    const entry = read(name);
    if (!entry || entry.text === "") {
      return { message: `E353: Nothing in register ${name}`, failed: true };
    }
    this.lastPlayed = name.toLowerCase();

    if (this.depth >= this.options.maxMacroDepth) {
      console.warn(
        `[VimEngine] Macro nesting exceeded ${this.options.maxMacroDepth} levels; playback aborted`
      );
      this.aborted = true;
      return { message: "E169: Command too recursive", failed: true };
    }

    const tokens = tokenizeKeystrokes(entry.text);
    if (this.depth === 0) {
      this.replayed = 0;
      this.aborted = false;
    }

    let message: string | null = null;
    this.depth++;
    try {
      for (let i = 0; i < Math.max(1, count) && !this.aborted; i++) {
        for (const token of tokens) {
          if (this.aborted) break;
          this.replayed++;
          if (this.replayed > this.options.maxMacroKeys) {
            console.warn(
              `[VimEngine] Macro replayed more than ${this.options.maxMacroKeys} keys; playback aborted`
            );
            this.aborted = true;
            message = "E169: Command too recursive";
            break;
          }
          const result = feed(token);
          if (result.message !== null) message = result.message;
          if (result.failed) this.aborted = true;
        }
      }
    } finally {
      this.depth--;
    }

    const failed = this.aborted;
    if (this.depth === 0) this.aborted = false;
    return { message, failed };
  }
}
