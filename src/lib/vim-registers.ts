import type { RegisterEntry } from "./vim-types";

export const UNNAMED_REGISTER = '"';
export const BLACK_HOLE_REGISTER = "_";

export function isValidRegister(name: string): boolean {
  return /^[a-zA-Z0-9"\-_]$/.test(name);
}

/** Registers a macro can be recorded into or played from. */
export function isMacroRegister(name: string): boolean {
  return /^[a-zA-Z0-9"]$/.test(name);
}

/**
 * Named and special registers. Linewise text is kept without a trailing
 * newline; the `linewise` flag carries that information to `p`.
 */
export class RegisterStore {
  private registers = new Map<string, RegisterEntry>();

  read(name: string): RegisterEntry | null {
    const key = /^[A-Z]$/.test(name) ? name.toLowerCase() : name;
    const entry = this.registers.get(key);
    return entry ? { ...entry } : null;
  }

  /** Raw write: no unnamed or numbered side effects. */
  write(name: string, text: string, linewise = false): void {
    if (name === BLACK_HOLE_REGISTER) return;
    if (/^[A-Z]$/.test(name)) {
      const lower = name.toLowerCase();
      const existing = this.registers.get(lower);
      if (existing) {
        const joiner = existing.linewise || linewise ? "\n" : "";
        this.registers.set(lower, {
          text: existing.text + joiner + text,
          linewise: existing.linewise || linewise,
        });
        return;
      }
      this.registers.set(lower, { text, linewise });
      return;
    }
    this.registers.set(name, { text, linewise });
  }

  yank(text: string, register: string | undefined, linewise: boolean): void {
    const reg = register ?? UNNAMED_REGISTER;
    if (reg === BLACK_HOLE_REGISTER) return;

    if (reg !== UNNAMED_REGISTER) {
      this.write(reg, text, linewise);
      this.copyToUnnamed(reg);
      return;
    }
    this.write("0", text, linewise);
    this.write(UNNAMED_REGISTER, text, linewise);
  }

  delete(text: string, register: string | undefined, linewise: boolean): void {
    const reg = register ?? UNNAMED_REGISTER;
    if (reg === BLACK_HOLE_REGISTER) return;

    if (reg !== UNNAMED_REGISTER) {
      this.write(reg, text, linewise);
      this.copyToUnnamed(reg);
      return;
    }

    this.shiftNumbered();
    this.write("1", text, linewise);
    if (!linewise && !text.includes("\n")) {
      this.write("-", text, linewise);
    }
    this.write(UNNAMED_REGISTER, text, linewise);
  }

  snapshot(): Record<string, RegisterEntry> {
    const entries: Record<string, RegisterEntry> = {};
    for (const [name, entry] of this.registers) {
      entries[name] = { ...entry };
    }
    return entries;
  }

  restore(entries: Record<string, RegisterEntry>): void {
    this.registers.clear();
    for (const [name, entry] of Object.entries(entries)) {
      if (isValidRegister(name) && name !== BLACK_HOLE_REGISTER) {
        this.registers.set(name.toLowerCase(), { ...entry });
      }
    }
  }

  /** Non-empty registers in `:registers` order. */
  list(): Array<[string, RegisterEntry]> {
    const order = (name: string): number => {
      if (name === UNNAMED_REGISTER) return 0;
      if (/^[0-9]$/.test(name)) return 1 + Number(name);
      if (/^[a-z]$/.test(name)) return 20 + name.charCodeAt(0);
      return 200;
    };
    return [...this.registers.entries()]
      .filter(([, entry]) => entry.text.length > 0)
      .sort(([a], [b]) => order(a) - order(b) || a.localeCompare(b))
      .map(([name, entry]) => [name, { ...entry }]);
  }

  clear(): void {
    this.registers.clear();
  }

  private copyToUnnamed(reg: string): void {
    const written = this.read(reg);
    if (written) this.registers.set(UNNAMED_REGISTER, written);
  }

  private shiftNumbered(): void {
    for (let i = 9; i >= 2; i--) {
      const from = this.registers.get(String(i - 1));
      if (from) this.registers.set(String(i), from);
    }
  }
}
