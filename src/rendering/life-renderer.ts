import { Application, Graphics, GraphicsContext, Container } from "pixi.js";
import type { ILifeGrid } from "../types/grid-types";
import type { Renderer, RendererMetrics } from "../types/renderer-types";
import { DEAD_COLOR } from "../constants";
import { cellColor } from "../utils/color-utils";
import { canvasSize } from "../utils/grid-utils";

export async function createLifeRenderer(canvas: HTMLCanvasElement, grid: ILifeGrid): Promise<Renderer> {
  const { width, height, cellSize } = grid;
  const size = canvasSize(width, height, cellSize);

  const app = new Application();
  await app.init({ canvas, width: size.width, height: size.height, background: DEAD_COLOR });
  app.ticker.stop();

  const cellContainer = new Container();
  app.stage.addChild(cellContainer);

  // Shared cell shape — a 1×1 white filled rect at the origin.
  // Every cell shares this context and varies only by position and tint.
  const cellContext = new GraphicsContext();
  cellContext.rect(0, 0, 1, 1).fill({ color: 0xffffff });

  const cellGraphics: Graphics[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const g = new Graphics(cellContext);
      g.position.set(x * cellSize, y * cellSize);
      g.scale.set(cellSize);
      g.tint = DEAD_COLOR;
      cellContainer.addChild(g);
      cellGraphics.push(g);
    }
  }

  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function update(current: ILifeGrid): RendererMetrics {
    const sceneT0 = performance.now();

    const { cells } = current;
    for (let i = 0; i < cellGraphics.length; i++) {
      cellGraphics[i].tint = cellColor(cells[i] === 1);
    }
    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return { sceneUpdateTimeMs };
  }

  return {
    canvas,
    update,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
    },
    destroy() {
      cellContext.destroy();
      app.destroy();
    },
  };
}
