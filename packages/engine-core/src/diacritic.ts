import type { CompositionBuffer } from "./composition";
import { rewriteAt } from "./edit";
import { cleanChar, isUpper } from "./tables";
import type { DiacriticRule, EditOperation, ShapeName } from "./types";

const rule = (base: string, pairWith: string, replaceWith: readonly [string, string]): DiacriticRule =>
  Object.freeze({ base, pairWith: Object.freeze(pairWith.split("")), replaceWith });

export const DIACRITIC_RULES: Readonly<Record<ShapeName, readonly DiacriticRule[]>> = Object.freeze({
  circumflex: [
    rule("a", "unmptcy", ["â", "Â"]),
    rule("e", "unmptcy", ["ê", "Ê"]),
    rule("o", "inmptcy", ["ô", "Ô"])
  ],
  horn: [
    rule("u", "oinmaptc", ["ư", "Ư"]),
    rule("o", "inmptcy", ["ơ", "Ơ"])
  ],
  breve: [rule("a", "pnmtc", ["ă", "Ă"])],
  crossed_d: [rule("d", "aceimnoptuy", ["đ", "Đ"])]
});

/**
 * Rewrites every letter that pairs with its follower under one of `rules`.
 * au6 becomes âu, while aq6 is left alone since q never follows â. A letter
 * at the end of the buffer always pairs.
 */
export function addDiacritic(
  buffer: CompositionBuffer,
  rules: readonly DiacriticRule[],
  compensateTrigger = true
): EditOperation[] {
  const chars = buffer.toArray();
  const ops: EditOperation[] = [];
  let isFirstEdit = compensateTrigger;
  for (const [i, ch] of chars.entries()) {
    const base = cleanChar(ch).toLowerCase();
    const isLast = i + 1 === chars.length;
    const follower = isLast ? "" : cleanChar(chars[i + 1].toLowerCase());
    for (const r of rules) {
      if (r.base !== base) continue;
      if (!isLast && !r.pairWith.includes(follower)) continue;
      const next = isUpper(ch) ? r.replaceWith[1] : r.replaceWith[0];
      ops.push(...rewriteAt(buffer, i, next, isFirstEdit));
      isFirstEdit = false;
    }
  }
  return ops;
}
