import type { ILifeGrid } from "../types/grid-types";
import { gridIndex } from "../utils/grid-utils";

/** Moore neighborhood offsets, as [dx, dy]. */
const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

/**
 * Number of alive cells among the 8 neighbors of (x, y).
 * Positions outside the grid count as dead; there is no wraparound.
 */
export function countNeighbors(grid: ILifeGrid, x: number, y: number): number {
  const { width, height, cells } = grid;
  let count = 0;
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    const nx = x + dx;
    const ny = y + dy;
    if (nx < 0 || nx >= width || ny < 0 || ny >= height) continue;
    count += cells[gridIndex(nx, ny, width)];
  }
  return count;
}
