/** Flat buffer index for cell (x, y) on a grid of the given width. */
export function gridIndex(x: number, y: number, width: number): number {
  return x + y * width;
}

/** Returns the cell coordinates under a canvas pixel position (integer division by cell size). */
export function cellAtPixel(px: number, py: number, cellSize: number): { x: number; y: number } {
  return { x: Math.floor(px / cellSize), y: Math.floor(py / cellSize) };
}

/** Canvas size in pixels for a grid of the given dimensions. */
export function canvasSize(width: number, height: number, cellSize: number): { width: number; height: number } {
  return { width: width * cellSize, height: height * cellSize };
}
