/**
 * Caps the frame loop at a target rate, independent of the display's
 * requestAnimationFrame rate. Tracks the rate actually achieved.
 */
export class FramePacer {
  targetFps: number;

  /** EMA-smoothed accepted frames per second. */
  actualFps = 0;

  private lastFrameTime = -1;

  /** EMA smoothing factor. */
  private readonly emaAlpha = 0.05;

  /** Subtracted from the frame interval so rAF timestamp jitter doesn't skip a frame. */
  private readonly toleranceMs = 1;

  constructor(targetFps: number) {
    this.targetFps = targetFps;
  }

  /**
   * Called on every rAF callback. Returns the elapsed ms since the last
   * accepted frame when this timestamp starts a new frame, or null when it
   * arrives too early.
   */
  accept(timestamp: number): number | null {
    // The first callback always starts a frame
    if (this.lastFrameTime < 0) {
      this.lastFrameTime = timestamp;
      return 0;
    }

    const elapsed = timestamp - this.lastFrameTime;
    const minFrameInterval = 1000 / this.targetFps - this.toleranceMs;
    if (elapsed < minFrameInterval) return null;
    this.lastFrameTime = timestamp;

    if (elapsed > 0) {
      const instantFps = 1000 / elapsed;
      this.actualFps = this.emaAlpha * instantFps + (1 - this.emaAlpha) * this.actualFps;
    }
    return elapsed;
  }
}
