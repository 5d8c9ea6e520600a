// Key tokens are single characters or canonical `<Name>` strings.

const NAMED_KEYS: Record<string, string> = {
  esc: "<Esc>",
  escape: "<Esc>",
  cr: "<CR>",
  enter: "<CR>",
  return: "<CR>",
  bs: "<BS>",
  backspace: "<BS>",
  del: "<Del>",
  delete: "<Del>",
  tab: "<Tab>",
  space: " ",
  lt: "<",
  bar: "|",
  up: "<Up>",
  down: "<Down>",
  left: "<Left>",
  right: "<Right>",
};

const RAW_KEYS: Record<string, string> = {
  "\x1b": "<Esc>",
  "\r": "<CR>",
  "\n": "<CR>",
  "\t": "<Tab>",
  "\x7f": "<BS>",
  "\b": "<BS>",
};

function controlKeyName(letter: string): string {
  return `<C-${letter.toLowerCase()}>`;
}

/**
 * Canonical name for the content between `<` and `>`, or null when the text
 * is not a key name (so the `<` is a literal character).
 */
function lookupKeyName(content: string): string | null {
  const lower = content.toLowerCase();
  if (NAMED_KEYS[lower]) return NAMED_KEYS[lower];
  const ctrl = lower.match(/^c-([a-z])$/);
  if (ctrl) {
    // terminal aliases
    if (ctrl[1] === "h") return "<BS>";
    if (ctrl[1] === "m" || ctrl[1] === "j") return "<CR>";
    if (ctrl[1] === "i") return "<Tab>";
    return controlKeyName(ctrl[1]);
  }
  if (lower === "c-[") return "<Esc>";
  return null;
}

export function normalizeKey(token: string): string {
  if (token.length === 1) {
    if (RAW_KEYS[token]) return RAW_KEYS[token];
    const code = token.charCodeAt(0);
    if (code >= 1 && code <= 26) {
      return lookupKeyName(`c-${String.fromCharCode(code + 96)}`) ?? token;
    }
    return token;
  }
  if (token.startsWith("<") && token.endsWith(">")) {
    return lookupKeyName(token.slice(1, -1)) ?? token;
  }
  return token;
}

export function isSpecialKey(token: string): boolean {
  return token.length > 1 && token.startsWith("<") && token.endsWith(">");
}

/**
 * Reads one key from the front of `input`. Returns null when `input` ends in
 * the middle of a key name (`<Es`), so streaming callers can wait for more.
 */
export function extractKeystroke(
  input: string
): { token: string; length: number } | null {
  if (input.length === 0) return null;

  if (input[0] === "<") {
    const endIdx = input.indexOf(">");
    if (endIdx === -1) {
      const partial = input.slice(1);
      return /^[A-Za-z-]{0,9}$/.test(partial) ? null : { token: "<", length: 1 };
    }
    const name = lookupKeyName(input.slice(1, endIdx));
    if (name) return { token: name, length: endIdx + 1 };
    return { token: "<", length: 1 };
  }

  // Keep surrogate pairs together
  const codePoint = input.codePointAt(0);
  const length = codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
  return { token: normalizeKey(input.slice(0, length)), length };
}

export function tokenizeKeystrokes(keystrokes: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < keystrokes.length) {
    const next = extractKeystroke(keystrokes.slice(i));
    if (!next) {
      // Unterminated key name at the end of complete input: literal text
      tokens.push("<");
      i += 1;
      continue;
    }
    tokens.push(next.token);
    i += next.length;
  }

  return tokens;
}

/** Inverse of `tokenizeKeystrokes`: literal `<` is written as `<lt>`. */
export function encodeKeys(tokens: readonly string[]): string {
  return tokens.map((token) => (token === "<" ? "<lt>" : token)).join("");
}

export function countKeystrokes(keystrokes: string): number {
  return tokenizeKeystrokes(keystrokes).length;
}

export function formatToken(token: string): string {
  if (token === " ") return "␣";
  if (token === "<CR>") return "↵";
  if (token === "<Tab>") return "⇥";
  return token;
}

/** Printable text a key inserts in insert mode, or null for command keys. */
export function insertableText(token: string): string | null {
  if (token === "<Tab>") return "\t";
  if (isSpecialKey(token)) return null;
  return token;
}
