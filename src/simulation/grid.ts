import type { ILifeGrid } from "../types/grid-types";
import { SPAWN_CHANCE_LIMIT } from "../constants";
import { gridIndex } from "../utils/grid-utils";
import { countNeighbors } from "./neighbors";

/** Uniform random number in [0, 1). */
export type RandomSource = () => number;

function assertDimension(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Dense, non-wrapping Life grid. Cells live in a flat byte buffer indexed
 * x + y * width; 1 = alive.
 *
 * update() reads the current buffer as a snapshot and writes the next
 * generation into a fresh one, so no cell sees a neighbor's new state
 * within the same pass.
 */
export class LifeGrid implements ILifeGrid {
  readonly width: number;
  readonly height: number;
  readonly cellSize: number;

  spawning = false;

  /**
   * Random spawning succeeds with probability 1 / spawnChance. Increments on
   * every successful spawn and is kept for the life of the grid; draws stop
   * once it reaches SPAWN_CHANCE_LIMIT.
   */
  spawnChance = 1;

  private _cells: Uint8Array;
  private _aliveCount = 0;
  private readonly random: RandomSource;

  constructor(width: number, height: number, cellSize: number, random: RandomSource = Math.random) {
    assertDimension("width", width, 0);
    assertDimension("height", height, 0);
    assertDimension("cellSize", cellSize, 1);
    this.width = width;
    this.height = height;
    this.cellSize = cellSize;
    this.random = random;
    this._cells = new Uint8Array(width * height);
  }

  /** Current generation. Read-only: edit cells through setAlive/toggle so aliveCount stays exact. */
  get cells(): Readonly<Uint8Array> {
    return this._cells;
  }

  get aliveCount(): number {
    return this._aliveCount;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  isAlive(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return false;
    return this._cells[gridIndex(x, y, this.width)] === 1;
  }

  /** Out-of-bounds writes are ignored. */
  setAlive(x: number, y: number, alive: boolean): void {
    if (!this.inBounds(x, y)) return;
    const i = gridIndex(x, y, this.width);
    const next = alive ? 1 : 0;
    if (this._cells[i] === next) return;
    this._cells[i] = next;
    this._aliveCount += alive ? 1 : -1;
  }

  toggle(x: number, y: number): void {
    this.setAlive(x, y, !this.isAlive(x, y));
  }

  setSpawning(on: boolean): void {
    this.spawning = on;
  }

  clear(): void {
    this._cells.fill(0);
    this._aliveCount = 0;
  }

  /** Advance one generation. */
  update(): void {
    const { width, height } = this;
    const current = this._cells;
    const next = new Uint8Array(width * height);
    let alive = 0;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const i = gridIndex(x, y, width);
        const neighbors = countNeighbors(this, x, y);

        let nextAlive = current[i] === 1
          ? neighbors === 2 || neighbors === 3
          : neighbors === 3;

        // Every dead cell draws, whether or not the rules bring it to life.
        if (current[i] === 0 && this.spawning) {
          nextAlive = this.drawSpawn() || nextAlive;
        }

        if (nextAlive) {
          next[i] = 1;
          alive++;
        }
      }
    }

    this._cells = next;
    this._aliveCount = alive;
  }

  /** Integer in [1, spawnChance] equals 1. */
  private drawSpawn(): boolean {
    if (this.spawnChance >= SPAWN_CHANCE_LIMIT) return false;
    if (Math.floor(this.random() * this.spawnChance) !== 0) return false;
    this.spawnChance++;
    return true;
  }
}
