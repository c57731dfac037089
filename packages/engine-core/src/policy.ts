import type { KeyAction, LogicalKey } from "./types";

export function classifyKey(key: LogicalKey): KeyAction {
  if (key.state !== "press") return "ignore";
  if (key.isNavigation || key.isWhitespace) return "reset";
  if (key.isBackspace) return "backspace";
  if (key.char === null || key.char.length === 0) return "ignore";
  return "compose";
}

export function normalizeCase(ch: string, shift: boolean): string {
  return shift ? ch.toUpperCase() : ch;
}
