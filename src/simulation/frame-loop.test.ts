import { runFrame, processInput, applyPointer } from "./frame-loop";
import { LifeGrid } from "./grid";
import { createSession } from "./session";
import type { InputEvent, PointerState } from "../types/input-types";

const CELL = 8;

const released: PointerState = { x: 0, y: 0, primaryDown: false };

function pressedAt(cx: number, cy: number): PointerState {
  // Somewhere inside the cell, not on its corner
  return { x: cx * CELL + 3, y: cy * CELL + 1, primaryDown: true };
}

function key(code: string): InputEvent {
  return { type: "keydown", code };
}

describe("applyPointer", () => {
  it("toggles the cell under the pointer while the button is held", () => {
    const grid = new LifeGrid(5, 5, CELL);
    applyPointer(grid, pressedAt(2, 3));
    expect(grid.isAlive(2, 3)).toBe(true);
    expect(grid.aliveCount).toBe(1);
  });

  it("flips the same cell again on every frame the button stays down", () => {
    const grid = new LifeGrid(5, 5, CELL);
    const pointer = pressedAt(1, 1);
    applyPointer(grid, pointer);
    applyPointer(grid, pointer);
    expect(grid.isAlive(1, 1)).toBe(false);
    applyPointer(grid, pointer);
    expect(grid.isAlive(1, 1)).toBe(true);
  });

  it("does nothing when the button is up", () => {
    const grid = new LifeGrid(5, 5, CELL);
    applyPointer(grid, { x: 9, y: 9, primaryDown: false });
    expect(grid.aliveCount).toBe(0);
  });

  it("ignores positions outside the grid", () => {
    const grid = new LifeGrid(5, 5, CELL);
    applyPointer(grid, { x: 5 * CELL, y: 4, primaryDown: true });
    applyPointer(grid, { x: -1, y: 4, primaryDown: true });
    expect(grid.aliveCount).toBe(0);
  });
});

describe("processInput", () => {
  it("ignores unbound keys", () => {
    const session = createSession();
    const grid = new LifeGrid(2, 2, CELL);
    processInput(key("KeyX"), session, grid);
    processInput(key("Enter"), session, grid);
    expect(session).toEqual(createSession());
    expect(grid.spawning).toBe(false);
  });

  it("clears running on quit", () => {
    const session = createSession();
    processInput({ type: "quit" }, session, new LifeGrid(2, 2, CELL));
    expect(session.running).toBe(false);
  });
});

describe("runFrame", () => {
  it("keeps a toggled cell alive indefinitely while paused", () => {
    const grid = new LifeGrid(5, 5, CELL);
    const session = createSession();
    runFrame(grid, session, [], pressedAt(2, 2));
    for (let i = 0; i < 10; i++) {
      runFrame(grid, session, [], released);
    }
    expect(grid.isAlive(2, 2)).toBe(true);
    expect(grid.aliveCount).toBe(1);
  });

  it("advances a generation once unpaused", () => {
    const grid = new LifeGrid(5, 5, CELL);
    grid.setAlive(1, 2, true);
    grid.setAlive(2, 2, true);
    grid.setAlive(3, 2, true);
    const session = createSession();

    const status = runFrame(grid, session, [key("Space")], released);

    expect(status.paused).toBe(false);
    expect(grid.isAlive(2, 1)).toBe(true);
    expect(grid.isAlive(1, 2)).toBe(false);
    expect(status.aliveCount).toBe(3);
  });

  it("applies the pointer before the generation step", () => {
    const grid = new LifeGrid(5, 5, CELL);
    const session = createSession();
    session.paused = false;
    // A lone cell drawn this frame dies in the same frame's update.
    const status = runFrame(grid, session, [], pressedAt(2, 2));
    expect(grid.isAlive(2, 2)).toBe(false);
    expect(status.aliveCount).toBe(0);
  });

  it("processes every queued key in order and empties the queue", () => {
    const grid = new LifeGrid(5, 5, CELL);
    const session = createSession();
    const events = [key("Equal"), key("Equal"), key("Minus"), key("KeyS")];
    const status = runFrame(grid, session, events, released);
    expect(events).toEqual([]);
    expect(status).toEqual({ paused: true, speed: 15, spawning: true, aliveCount: 0, running: true });
  });

  it("toggles spawning from the S key whatever case it types", () => {
    const grid = new LifeGrid(5, 5, CELL);
    const session = createSession();
    // Caps Lock or Shift change KeyboardEvent.key to "S" but leave the code as "KeyS".
    runFrame(grid, session, [key("KeyS")], released);
    expect(grid.spawning).toBe(true);
  });

  it("clamps repeated speed-ups at 120", () => {
    const session = createSession();
    const events: InputEvent[] = [];
    for (let i = 0; i < 30; i++) events.push(key("Equal"));
    const status = runFrame(new LifeGrid(5, 5, CELL), session, events, released);
    expect(status.speed).toBe(120);
  });

  it("stops at a quit event without stepping or applying later input", () => {
    const grid = new LifeGrid(5, 5, CELL);
    grid.setAlive(0, 0, true);
    const session = createSession();
    session.paused = false;
    const events: InputEvent[] = [{ type: "quit" }, key("Space")];

    const status = runFrame(grid, session, events, pressedAt(3, 3));

    expect(status.running).toBe(false);
    expect(status.paused).toBe(false);
    expect(events).toEqual([]);
    expect(grid.isAlive(0, 0)).toBe(true);
    expect(grid.isAlive(3, 3)).toBe(false);
  });
});
