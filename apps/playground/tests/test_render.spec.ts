import { describe, it, expect } from "vitest";
import { charKey } from "@vni/engine-core/src/keys";
import type { EditOperation } from "@vni/engine-core/src/types";
import { formatOps, formatTrace, renderStatus } from "../src/render";

const ops: EditOperation[] = [
  { type: "backspace", count: 2 },
  { type: "insert", char: "â" }
];

describe("render", () => {
  it("formats operations", () => {
    expect(formatOps([])).toBe("pass");
    expect(formatOps(ops)).toBe("bs2 +â");
  });

  it("renders the status lines", () => {
    expect(renderStatus({ text: "â", composition: "â", lastOps: ops, latencyMs: 0.5 })).toEqual([
      "text: â",
      "composition: â",
      "ops: bs2 +â",
      "latency: 0.50 ms"
    ]);
  });

  it("formats a trace line", () => {
    expect(formatTrace({ key: charKey("6"), action: "compose", composition: "â", ops })).toBe(
      '[vni] compose "6" -> "â" bs2 +â'
    );
  });
});
