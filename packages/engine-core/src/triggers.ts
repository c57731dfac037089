import type { Trigger } from "./types";

export const TRIGGERS: ReadonlyMap<string, Trigger> = new Map<string, Trigger>([
  ["1", { kind: "tone", tone: "acute" }],
  ["2", { kind: "tone", tone: "grave" }],
  ["3", { kind: "tone", tone: "hook_above" }],
  ["4", { kind: "tone", tone: "tilde" }],
  ["5", { kind: "tone", tone: "dot" }],
  ["6", { kind: "shape", shape: "circumflex" }],
  ["7", { kind: "shape", shape: "horn" }],
  ["8", { kind: "shape", shape: "breve" }],
  ["9", { kind: "shape", shape: "crossed_d" }]
]);

export function triggerFor(ch: string): Trigger | undefined {
  return TRIGGERS.get(ch);
}
