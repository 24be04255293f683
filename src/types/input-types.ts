/** Discrete session commands bound to keys. */
export type KeyAction = "togglePause" | "speedUp" | "speedDown" | "toggleSpawning";

/** Queued input event, drained once per frame. */
export type InputEvent =
  | { type: "keydown"; code: string }
  | { type: "quit" };

/** Last known pointer position in canvas pixels and whether the primary button is held. */
export interface PointerState {
  x: number;
  y: number;
  primaryDown: boolean;
}
