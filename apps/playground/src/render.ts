import type { EditOperation, EngineTrace } from "@vni/engine-core/src/types";
import type { PlaygroundState } from "./state";

export function formatOps(ops: readonly EditOperation[]): string {
  if (ops.length === 0) return "pass";
  return ops.map((op) => (op.type === "backspace" ? `bs${op.count}` : `+${op.char}`)).join(" ");
}

export function renderStatus(state: Pick<PlaygroundState, "text" | "composition" | "lastOps" | "latencyMs">): string[] {
  return [
    `text: ${state.text}`,
    `composition: ${state.composition}`,
    `ops: ${formatOps(state.lastOps)}`,
    `latency: ${state.latencyMs.toFixed(2)} ms`
  ];
}

export function formatTrace(event: EngineTrace): string {
  const char = event.key.char === null ? "-" : JSON.stringify(event.key.char);
  return `[vni] ${event.action} ${char} -> ${JSON.stringify(event.composition)} ${formatOps(event.ops)}`;
}
