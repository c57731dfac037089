import type { CompositionBuffer } from "./composition";
import { rewriteAt } from "./edit";
import { toneFor } from "./tables";
import type { EditOperation, ToneName } from "./types";
import { selectVowel } from "./vowel";

export function addAccent(buffer: CompositionBuffer, tone: ToneName, compensateTrigger = true): EditOperation[] {
  const vowel = selectVowel(buffer.toArray());
  if (!vowel) return [];
  const replacement = toneFor(tone, vowel.char);
  // gi followed by a consonant selects a letter no tone applies to
  if (replacement === undefined) return [];
  return rewriteAt(buffer, vowel.index, replacement, compensateTrigger);
}
