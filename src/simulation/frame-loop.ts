import type { InputEvent, PointerState } from "../types/input-types";
import type { LifeGrid } from "./grid";
import { applyAction, SessionState } from "./session";
import { keyToAction } from "../utils/key-bindings";
import { cellAtPixel } from "../utils/grid-utils";

/** Snapshot of session and grid state published to the UI after each frame. */
export interface FrameStatus {
  paused: boolean;
  speed: number;
  spawning: boolean;
  aliveCount: number;
  running: boolean;
}

/** Applies one queued input event. */
export function processInput(event: InputEvent, session: SessionState, grid: LifeGrid): void {
  if (event.type === "quit") {
    session.running = false;
    return;
  }
  const action = keyToAction(event.code);
  if (action) applyAction(action, session, grid);
}

/**
 * Toggles the cell under the pointer while the primary button is held.
 * Runs every frame, so a held button flips the same cell once per frame.
 */
export function applyPointer(grid: LifeGrid, pointer: PointerState): void {
  if (!pointer.primaryDown) return;
  const { x, y } = cellAtPixel(pointer.x, pointer.y, grid.cellSize);
  if (grid.inBounds(x, y)) grid.toggle(x, y);
}

export function frameStatus(grid: LifeGrid, session: SessionState): FrameStatus {
  return {
    paused: session.paused,
    speed: session.speed,
    spawning: grid.spawning,
    aliveCount: grid.aliveCount,
    running: session.running,
  };
}

/**
 * One frame of the loop, minus drawing:
 *
 * 1. Drain the input queue (events after a quit are dropped)
 * 2. Apply the pointer
 * 3. Advance one generation unless paused
 *
 * The queue is emptied in place.
 */
export function runFrame(
  grid: LifeGrid, session: SessionState, events: InputEvent[], pointer: PointerState,
): FrameStatus {
  const pending = events.splice(0, events.length);
  for (const event of pending) {
    processInput(event, session, grid);
    if (!session.running) return frameStatus(grid, session);
  }

  applyPointer(grid, pointer);

  if (!session.paused) {
    grid.update();
  }

  return frameStatus(grid, session);
}
