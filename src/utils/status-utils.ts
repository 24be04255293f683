import type { FrameStatus } from "../simulation/frame-loop";
import {
  STATUS_TEXT_OFFSET_CELLS, STATUS_LINE_Y, LEGEND_BOTTOM_MARGIN, STATUS_FONT_SIZE, STATUS_FONT_SIZE_WIDE,
} from "../constants";

export const KEY_BINDING_LEGEND =
  "Pause/Play: SPACE | Randomly Spawn Cells: s | Faster: = | Slower: - | Left Click: Toggle Cell";

/** The run-state line shown above the grid. */
export function formatStatusLine(status: FrameStatus): string {
  const state = status.paused ? "Paused" : "Running";
  const spawning = status.spawning ? "True" : "False";
  return `Game State: ${state} | Alive: ${status.aliveCount} | Simulation Speed: ${status.speed} | Spawning: ${spawning}`;
}

export interface StatusTextLayout {
  left: number;
  statusTop: number;
  legendTop: number;
  fontSize: number;
}

/**
 * Pixel placement of the two status lines over a grid of the given size.
 * Both lines share a left edge; the legend sits near the bottom.
 */
export function statusTextLayout(width: number, height: number, cellSize: number): StatusTextLayout {
  return {
    left: Math.max(0, height * cellSize - cellSize * STATUS_TEXT_OFFSET_CELLS),
    statusTop: STATUS_LINE_Y,
    legendTop: width * cellSize - LEGEND_BOTTOM_MARGIN,
    fontSize: width > 100 ? STATUS_FONT_SIZE_WIDE : STATUS_FONT_SIZE,
  };
}
