import type { ILifeGrid } from "./grid-types";

export interface RendererMetrics {
  /** EMA-smoothed time spent rebuilding the scene per frame, in ms. */
  sceneUpdateTimeMs: number;
}

export interface Renderer {
  update(grid: ILifeGrid): RendererMetrics;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
