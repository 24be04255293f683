// ── Grid ──

/** Number of cell columns in the grid. */
export const GRID_WIDTH = 100;

/** Number of cell rows in the grid. */
export const GRID_HEIGHT = 100;

/** Side length of one cell in pixels. */
export const CELL_SIZE = 8;

// ── Simulation ──

/** Generations (and frames) per second at startup. */
export const INITIAL_SPEED = 10;

/** Amount the speed keys change the tick rate by. */
export const SPEED_STEP = 5;

/** Slowest allowed tick rate. */
export const MIN_SPEED = 5;

/** Fastest allowed tick rate. */
export const MAX_SPEED = 120;

/** Spawn-chance counter value at which random spawning stops drawing. */
export const SPAWN_CHANCE_LIMIT = 1000;

// ── Rendering ──

/** Tint for alive cells. */
export const ALIVE_COLOR = 0xffffff;

/** Tint for dead cells and the canvas background. */
export const DEAD_COLOR = 0x000000;

/** Status text color. */
export const TEXT_COLOR = 0xffffff;

/** Left edge of the status text: canvas pixel height minus this many cells. */
export const STATUS_TEXT_OFFSET_CELLS = 70;

/** Vertical pixel offset of the status line. */
export const STATUS_LINE_Y = 10;

/** Distance in pixels between the legend line and the bottom of the canvas. */
export const LEGEND_BOTTOM_MARGIN = 20;

/** Font sizes in px for the status overlay; the larger one is used on grids wider than 100 cells. */
export const STATUS_FONT_SIZE = 16;
export const STATUS_FONT_SIZE_WIDE = 18;
