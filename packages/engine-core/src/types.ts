export type KeyState = "press" | "release";

export type LogicalKey = {
  char: string | null; // null for modifiers and keys that produce no text
  state: KeyState;
  shift: boolean;
  isNavigation: boolean;
  isWhitespace: boolean;
  isBackspace: boolean;
};

export type EditOperation =
  | { type: "backspace"; count: number }
  | { type: "insert"; char: string };

export type KeyAction = "reset" | "backspace" | "compose" | "ignore";

export type ToneName = "acute" | "grave" | "hook_above" | "tilde" | "dot";

export type ShapeName = "circumflex" | "horn" | "breve" | "crossed_d";

export type Trigger =
  | { kind: "tone"; tone: ToneName }
  | { kind: "shape"; shape: ShapeName };

export type DiacriticRule = {
  base: string;
  pairWith: readonly string[];
  replaceWith: readonly [lower: string, upper: string];
};

export type VowelChoice = {
  char: string; // tone stripped, shape kept
  index: number;
};

export type EngineTrace = {
  key: LogicalKey;
  action: KeyAction;
  composition: string;
  ops: EditOperation[];
};

export type EngineOptions = {
  /**
   * Whether the host has already committed the trigger keystroke into the
   * text field when the engine sees it. When true (the default) the first
   * rewrite of a key deletes one extra character to remove it.
   */
  hostCommitsTrigger?: boolean;
  trace?: (event: EngineTrace) => void;
};
