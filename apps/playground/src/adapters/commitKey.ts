import { normalizeCase } from "@vni/engine-core/src/policy";
import type { LogicalKey } from "@vni/engine-core/src/types";

// What a text field does with a raw keystroke the engine did not intercept.
export function commitKey(text: string, key: LogicalKey): string {
  if (key.state !== "press") return text;
  if (key.isBackspace) return Array.from(text).slice(0, -1).join("");
  if (key.isNavigation || key.char === null) return text;
  return text + normalizeCase(key.char, key.shift);
}
