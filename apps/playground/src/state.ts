import { createStore } from "zustand/vanilla";
import { applyEdits } from "@vni/engine-core/src/edit";
import { Engine } from "@vni/engine-core/src/engine";
import type { EditOperation, EngineOptions, LogicalKey } from "@vni/engine-core/src/types";
import { commitKey } from "./adapters/commitKey";

export type PlaygroundState = {
  text: string;
  composition: string;
  lastOps: EditOperation[];
  keyCount: number;
  latencyMs: number;
  pressKey: (key: LogicalKey) => void;
  clear: () => void;
};

export function createPlaygroundStore(options: EngineOptions = {}) {
  const engine = new Engine(options);
  const hostCommitsTrigger = options.hostCommitsTrigger ?? true;

  return createStore<PlaygroundState>((set, get) => ({
    text: "",
    composition: "",
    lastOps: [],
    keyCount: 0,
    latencyMs: 0,
    pressKey: (key) => {
      const t0 = performance.now();
      const s = get();
      const ops = engine.handleKey(key);
      let text: string;
      if (hostCommitsTrigger) {
        text = applyEdits(commitKey(s.text, key), ops);
      } else {
        // The field never saw the trigger, so the operations replace the keystroke.
        text = ops.length > 0 ? applyEdits(s.text, ops) : commitKey(s.text, key);
      }
      set({
        text,
        composition: engine.composition,
        lastOps: ops,
        keyCount: s.keyCount + 1,
        latencyMs: performance.now() - t0
      });
    },
    clear: () => {
      engine.reset();
      set({ text: "", composition: "", lastOps: [] });
    }
  }));
}

export type PlaygroundStore = ReturnType<typeof createPlaygroundStore>;
