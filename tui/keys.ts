/**
 * Keypress normalization for readline's `keypress` events.
 */

export type KeyEvent =
  | { kind: "char"; char: string }
  | { kind: "enter" }
  | { kind: "backspace" }
  | { kind: "escape" }
  | { kind: "tab" }
  | { kind: "left" }
  | { kind: "right" }
  | { kind: "up" }
  | { kind: "down" }
  | { kind: "interrupt" }
  | { kind: "ctrl"; name: string }
  | { kind: "other" };

// Shape of the second argument readline passes to "keypress" listeners
export interface ReadlineKey {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  sequence?: string;
}

const NAMED_KEYS = new Map<string, KeyEvent>([
  ["return", { kind: "enter" }],
  ["enter", { kind: "enter" }],
  ["backspace", { kind: "backspace" }],
  ["escape", { kind: "escape" }],
  ["tab", { kind: "tab" }],
  ["left", { kind: "left" }],
  ["right", { kind: "right" }],
  ["up", { kind: "up" }],
  ["down", { kind: "down" }],
]);

function isPrintable(value: string): boolean {
  return [...value].length === 1 && !/[\u0000-\u001f\u007f]/.test(value);
}

export function normalizeKeypress(str: string | undefined, key: ReadlineKey | undefined): KeyEvent {
  if (key?.ctrl && key.name) {
    return key.name === "c" ? { kind: "interrupt" } : { kind: "ctrl", name: key.name };
  }

  if (key?.name) {
    const named = NAMED_KEYS.get(key.name);
    if (named) return named;
  }

  if (str && !key?.meta && isPrintable(str)) {
    return { kind: "char", char: str };
  }

  return { kind: "other" };
}
