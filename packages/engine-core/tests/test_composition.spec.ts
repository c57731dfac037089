import { describe, it, expect } from "vitest";
import { CompositionBuffer } from "../src/composition";

describe("composition buffer", () => {
  it("appends and pops from the tail", () => {
    const b = new CompositionBuffer();
    b.push("h");
    b.push("a");
    expect(b.pop()).toBe("a");
    expect(b.toArray()).toEqual(["h"]);
  });

  it("pop on empty buffer is a no-op", () => {
    const b = new CompositionBuffer();
    expect(b.pop()).toBeUndefined();
    expect(b.length).toBe(0);
  });

  it("replaces in place without changing length", () => {
    const b = new CompositionBuffer();
    for (const ch of "an") b.push(ch);
    b.replaceAt(0, "ă");
    expect(b.toString()).toBe("ăn");
    expect(b.length).toBe(2);
  });

  it("rejects out of range replacement", () => {
    const b = new CompositionBuffer();
    b.push("a");
    expect(() => b.replaceAt(1, "â")).toThrow(RangeError);
  });

  it("snapshots are copies", () => {
    const b = new CompositionBuffer();
    b.push("a");
    const copy = b.toArray();
    copy.push("b");
    expect(b.toArray()).toEqual(["a"]);
  });
});
