import type { CompositionBuffer } from "./composition";
import type { EditOperation } from "./types";

/**
 * Operations that turn the field's trailing `chars` into the same characters
 * with `chars[index]` replaced by `nextChar`. A first edit deletes one more
 * character: the trigger keystroke the host already committed.
 */
export function synthesizeEdit(
  chars: readonly string[],
  index: number,
  nextChar: string,
  isFirstEdit: boolean
): EditOperation[] {
  const count = chars.length - index + (isFirstEdit ? 1 : 0);
  const ops: EditOperation[] = [
    { type: "backspace", count },
    { type: "insert", char: nextChar }
  ];
  for (const ch of chars.slice(index + 1)) ops.push({ type: "insert", char: ch });
  return ops;
}

export function rewriteAt(
  buffer: CompositionBuffer,
  index: number,
  nextChar: string,
  isFirstEdit: boolean
): EditOperation[] {
  const ops = synthesizeEdit(buffer.toArray(), index, nextChar, isFirstEdit);
  buffer.replaceAt(index, nextChar);
  return ops;
}

// Reference host: the cursor sits at the end of `text`.
export function applyEdits(text: string, ops: readonly EditOperation[]): string {
  const chars = Array.from(text);
  for (const op of ops) {
    if (op.type === "backspace") chars.splice(Math.max(0, chars.length - op.count));
    else chars.push(op.char);
  }
  return chars.join("");
}
