import { describe, it, expect } from "vitest";
import { applyEdits } from "../src/edit";
import { Engine } from "../src/engine";
import { charKey, keysFromText, modifierKey, navigationKey, whitespaceKey } from "../src/keys";
import type { EngineTrace, LogicalKey } from "../src/types";

// Host that commits every keystroke before the engine rewrites the field.
function commitRaw(field: string, key: LogicalKey): string {
  if (key.isBackspace) return field.slice(0, -1);
  return key.char === null ? field : field + key.char;
}

function typeInto(engine: Engine, text: string, field = ""): string {
  for (const key of keysFromText(text)) {
    field = applyEdits(commitRaw(field, key), engine.handleKey(key));
  }
  return field;
}

describe("engine end-to-end", () => {
  it("a then 6 gives â", () => {
    const e = new Engine();
    e.handleKey(charKey("a"));
    expect(e.handleKey(charKey("6"))).toEqual([
      { type: "backspace", count: 2 },
      { type: "insert", char: "â" }
    ]);
    expect(e.snapshot()).toEqual(["â"]);
  });

  it("an unmatched trigger is typed as a literal", () => {
    const e = new Engine();
    const ops = e.handleKeys(keysFromText("aq6"));
    expect(ops[2]).toEqual([]);
    expect(e.composition).toBe("aq6");
  });

  it("types thướng", () => {
    const e = new Engine();
    expect(typeInto(e, "thuong71")).toBe("thướng");
    expect(e.composition).toBe("thướng");
  });

  it("types across words", () => {
    const e = new Engine();
    expect(typeInto(e, "Viet65 Nam")).toBe("Việt Nam");
    expect(e.composition).toBe("Nam");
  });

  it("passes plain letters through", () => {
    const e = new Engine();
    e.handleKeys(keysFromText("xy"));
    expect(e.handleKey(charKey("k"))).toEqual([]);
    expect(e.composition).toBe("xyk");
  });

  it("whitespace and navigation clear the composition", () => {
    const e = new Engine();
    e.handleKeys(keysFromText("hoa1"));
    expect(e.handleKey(navigationKey())).toEqual([]);
    expect(e.composition).toBe("");

    e.handleKeys(keysFromText("ba"));
    expect(e.handleKey(whitespaceKey("\n"))).toEqual([]);
    expect(e.composition).toBe("");
  });

  it("backspace pops the composition", () => {
    const e = new Engine();
    e.handleKeys(keysFromText("ab\b"));
    expect(e.composition).toBe("a");
    e.handleKeys(keysFromText("\b\b"));
    expect(e.composition).toBe("");
  });

  it("a backspaced letter no longer takes the tone", () => {
    const e = new Engine();
    expect(typeInto(e, "hoan\b\b1")).toBe("hó");
  });

  it("shift uppercases the letter", () => {
    const e = new Engine();
    e.handleKey(charKey("a", { shift: true }));
    e.handleKey(charKey("6"));
    expect(e.composition).toBe("Â");
  });

  it("releases and modifiers change nothing", () => {
    const e = new Engine();
    expect(e.handleKey(charKey("a", { state: "release" }))).toEqual([]);
    expect(e.handleKey(modifierKey())).toEqual([]);
    expect(e.composition).toBe("");
  });

  it("a tone with no vowel is typed as a digit", () => {
    const e = new Engine();
    expect(typeInto(e, "b1")).toBe("b1");
    expect(e.composition).toBe("b1");
  });

  it("supports hosts that suppress the trigger keystroke", () => {
    const e = new Engine({ hostCommitsTrigger: false });
    e.handleKey(charKey("a"));
    const ops = e.handleKey(charKey("6"));
    expect(ops).toEqual([
      { type: "backspace", count: 1 },
      { type: "insert", char: "â" }
    ]);
    expect(applyEdits("a", ops)).toBe("â");
  });

  it("traces each key after the buffer update", () => {
    const events: EngineTrace[] = [];
    const e = new Engine({ trace: (ev) => events.push(ev) });
    e.handleKeys(keysFromText("a6"));
    expect(events.map((ev) => [ev.action, ev.composition, ev.ops.length])).toEqual([
      ["compose", "a", 0],
      ["compose", "â", 2]
    ]);
  });

  it("explicit reset clears the composition", () => {
    const e = new Engine();
    e.handleKeys(keysFromText("duong"));
    e.reset();
    expect(e.composition).toBe("");
  });

  it("is deterministic", () => {
    const a = new Engine();
    const b = new Engine();
    const keys = keysFromText("nguoi72 Viet65");
    expect(a.handleKeys(keys)).toEqual(b.handleKeys(keys));
  });
});
