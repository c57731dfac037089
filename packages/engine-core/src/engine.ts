import { addAccent } from "./accent";
import { CompositionBuffer } from "./composition";
import { addDiacritic, DIACRITIC_RULES } from "./diacritic";
import { classifyKey, normalizeCase } from "./policy";
import { triggerFor } from "./triggers";
import type { EditOperation, EngineOptions, EngineTrace, LogicalKey } from "./types";

export class Engine {
  private buffer = new CompositionBuffer();
  private readonly hostCommitsTrigger: boolean;
  private readonly trace?: (event: EngineTrace) => void;

  constructor(options: EngineOptions = {}) {
    this.hostCommitsTrigger = options.hostCommitsTrigger ?? true;
    this.trace = options.trace;
  }

  get composition(): string {
    return this.buffer.toString();
  }

  snapshot(): string[] {
    return this.buffer.toArray();
  }

  reset(): void {
    this.buffer.clear();
  }

  handleKey(key: LogicalKey): EditOperation[] {
    const action = classifyKey(key);
    let ops: EditOperation[] = [];

    if (action === "reset") {
      this.buffer.clear();
    } else if (action === "backspace") {
      this.buffer.pop();
    } else if (action === "compose" && key.char !== null) {
      const ch = normalizeCase(key.char, key.shift);
      ops = this.handleChar(ch);
      // A trigger that rewrote nothing is typed as a plain letter.
      if (ops.length === 0) this.buffer.push(ch);
    }

    this.trace?.({ key, action, composition: this.buffer.toString(), ops });
    return ops;
  }

  /** Feeds keys in order and returns the operations of each. */
  handleKeys(keys: Iterable<LogicalKey>): EditOperation[][] {
    const out: EditOperation[][] = [];
    for (const key of keys) out.push(this.handleKey(key));
    return out;
  }

  private handleChar(ch: string): EditOperation[] {
    const trigger = triggerFor(ch);
    if (!trigger) return [];
    if (trigger.kind === "tone") return addAccent(this.buffer, trigger.tone, this.hostCommitsTrigger);
    return addDiacritic(this.buffer, DIACRITIC_RULES[trigger.shape], this.hostCommitsTrigger);
  }
}
