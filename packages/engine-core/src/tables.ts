import toneData from "../data/tone_maps.json";
import type { ToneName } from "./types";

export type ToneMap = Readonly<Record<string, string>>;

const TONE_NAMES: readonly ToneName[] = ["acute", "grave", "hook_above", "tilde", "dot"];

export const TONE_MAPS: Readonly<Record<ToneName, ToneMap>> = Object.freeze({
  acute: Object.freeze({ ...toneData.tones.acute }),
  grave: Object.freeze({ ...toneData.tones.grave }),
  hook_above: Object.freeze({ ...toneData.tones.hook_above }),
  tilde: Object.freeze({ ...toneData.tones.tilde }),
  dot: Object.freeze({ ...toneData.tones.dot })
});

const shapeBase = new Map<string, string>(Object.entries(toneData.shapes));

// Every toned vowel back to its untoned (but still shaped) form.
const untoned = (() => {
  const out = new Map<string, string>();
  for (const tone of TONE_NAMES) {
    for (const [plain, toned] of Object.entries(TONE_MAPS[tone])) out.set(toned, plain);
  }
  return out;
})();

export function stripTone(ch: string): string {
  return untoned.get(ch) ?? ch;
}

export function cleanChar(ch: string): string {
  const plain = stripTone(ch);
  return shapeBase.get(plain) ?? plain;
}

export function toneFor(tone: ToneName, ch: string): string | undefined {
  return TONE_MAPS[tone][stripTone(ch)];
}

export function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase();
}
