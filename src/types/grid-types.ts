/**
 * Read-only view of a Life grid.
 * Used by rendering and utility code that reads cell state without modifying it.
 */
export interface ILifeGrid {
  readonly width: number;
  readonly height: number;
  readonly cellSize: number;
  /** One byte per cell, 1 = alive, indexed x + y * width. Never written through this view. */
  readonly cells: Readonly<Uint8Array>;
  readonly aliveCount: number;
  readonly spawning: boolean;
}
