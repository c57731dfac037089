import type { Key } from "node:readline";
import type { LogicalKey } from "@vni/engine-core/src/types";
import { backspaceKey, charKey, modifierKey, navigationKey, whitespaceKey } from "@vni/engine-core/src/keys";

const NAVIGATION = new Set(["up", "down", "left", "right", "home", "end", "pageup", "pagedown"]);

const WHITESPACE = new Map<string, string>([
  ["return", "\n"],
  ["enter", "\n"],
  ["tab", "\t"],
  ["space", " "]
]);

const control = /\p{Cc}/u;

export function fromTerminal(str: string | undefined, key: Key = {}): LogicalKey {
  const name = key.name ?? "";
  const whitespace = WHITESPACE.get(name);
  if (whitespace !== undefined) return whitespaceKey(whitespace);
  if (name === "backspace") return backspaceKey();
  if (NAVIGATION.has(name)) return navigationKey();
  if (key.ctrl || key.meta || str === undefined) return modifierKey();
  if (Array.from(str).length !== 1 || control.test(str)) return modifierKey();
  return charKey(str, { shift: key.shift ?? false });
}
