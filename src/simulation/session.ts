import type { KeyAction } from "../types/input-types";
import type { LifeGrid } from "./grid";
import { INITIAL_SPEED, MIN_SPEED, MAX_SPEED, SPEED_STEP } from "../constants";

/**
 * Run parameters owned by the frame loop. The spawning latch lives on the
 * grid itself.
 */
export interface SessionState {
  paused: boolean;
  /** Tick rate: frames, and generations while running, per second. */
  speed: number;
  /** Cleared by a quit event; the loop stops once this is false. */
  running: boolean;
}

export function createSession(): SessionState {
  return { paused: true, speed: INITIAL_SPEED, running: true };
}

export function clampSpeed(speed: number): number {
  return Math.max(MIN_SPEED, Math.min(MAX_SPEED, speed));
}

export function togglePause(session: SessionState): void {
  session.paused = !session.paused;
}

export function adjustSpeed(session: SessionState, delta: number): void {
  session.speed = clampSpeed(session.speed + delta);
}

export function applyAction(action: KeyAction, session: SessionState, grid: LifeGrid): void {
  switch (action) {
    case "togglePause":
      togglePause(session);
      break;
    case "speedUp":
      adjustSpeed(session, SPEED_STEP);
      break;
    case "speedDown":
      adjustSpeed(session, -SPEED_STEP);
      break;
    case "toggleSpawning":
      grid.setSpawning(!grid.spawning);
      break;
  }
}
