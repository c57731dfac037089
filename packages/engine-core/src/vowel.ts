import { stripTone } from "./tables";
import type { VowelChoice } from "./types";

const SHAPED_VOWELS = new Set(["â", "ă", "ê", "ô", "ư"]);
const PAIRS_WITH_O = new Set(["a", "e", "o", "y"]);
const VOWEL_RANK: Readonly<Record<string, number>> = { a: 5, e: 4, i: 3, o: 2, u: 1, y: 0 };

// Where the tone goes, in order:
// - ơ, the first one
// - otherwise the last of â ă ê ô ư
// - otherwise the second letter of oa oe oo oy
// - otherwise the letter after gi
// - otherwise the highest ranked of a e i o u y, earliest on ties
export function selectVowel(chars: readonly string[]): VowelChoice | null {
  let shaped: VowelChoice | null = null;
  let ranked: VowelChoice | null = null;
  let bestRank = -1;
  const fold = (index: number) => stripTone(chars[index]).toLowerCase();

  for (let i = 0; i < chars.length; i++) {
    const ch = stripTone(chars[i]);
    const lower = ch.toLowerCase();
    if (lower === "ơ") return { char: ch, index: i };
    if (SHAPED_VOWELS.has(lower)) {
      shaped = { char: ch, index: i };
      continue;
    }
    if (lower === "o" && i + 1 < chars.length && PAIRS_WITH_O.has(fold(i + 1))) {
      return { char: stripTone(chars[i + 1]), index: i + 1 };
    }
    if (lower === "g" && i + 2 < chars.length && fold(i + 1) === "i") {
      return { char: stripTone(chars[i + 2]), index: i + 2 };
    }
    const rank = VOWEL_RANK[lower];
    if (rank !== undefined && rank > bestRank) {
      bestRank = rank;
      ranked = { char: ch, index: i };
    }
  }
  return shaped ?? ranked;
}
