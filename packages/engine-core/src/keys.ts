import type { LogicalKey } from "./types";

const blank: LogicalKey = {
  char: null,
  state: "press",
  shift: false,
  isNavigation: false,
  isWhitespace: false,
  isBackspace: false
};

export function charKey(char: string, opts: { shift?: boolean; state?: LogicalKey["state"] } = {}): LogicalKey {
  return { ...blank, char, shift: opts.shift ?? false, state: opts.state ?? "press" };
}

export function whitespaceKey(char = " "): LogicalKey {
  return { ...blank, char, isWhitespace: true };
}

export function navigationKey(): LogicalKey {
  return { ...blank, isNavigation: true };
}

export function backspaceKey(): LogicalKey {
  return { ...blank, isBackspace: true };
}

export function modifierKey(): LogicalKey {
  return { ...blank };
}

// "\b" stands for backspace; any whitespace resets the composition.
export function keysFromText(text: string): LogicalKey[] {
  const keys: LogicalKey[] = [];
  for (const ch of text) {
    if (ch === "\b") keys.push(backspaceKey());
    else if (/\s/.test(ch)) keys.push(whitespaceKey(ch));
    else keys.push(charKey(ch));
  }
  return keys;
}
