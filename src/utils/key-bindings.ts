import type { KeyAction } from "../types/input-types";

/**
 * Keyboard bindings, keyed by KeyboardEvent.code: physical keys, so Shift and
 * Caps Lock don't change what a key does.
 */
export const KEY_BINDINGS: Readonly<Record<string, KeyAction>> = {
  Space: "togglePause",
  Equal: "speedUp",
  Minus: "speedDown",
  KeyS: "toggleSpawning",
};

/** Action bound to a key code, or null for unbound keys. */
export function keyToAction(code: string): KeyAction | null {
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, code) ? KEY_BINDINGS[code] : null;
}
