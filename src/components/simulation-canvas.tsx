import React, { useRef, useEffect } from "react";
import { createLifeRenderer } from "../rendering/life-renderer";
import type { Renderer } from "../types/renderer-types";
import type { InputEvent, PointerState } from "../types/input-types";
import { LifeGrid } from "../simulation/grid";
import { createSession } from "../simulation/session";
import { FrameStatus, runFrame } from "../simulation/frame-loop";
import { FramePacer } from "../simulation/frame-pacer";
import { canvasSize } from "../utils/grid-utils";

export interface FrameMetrics {
  fps: number;
  sceneUpdateTimeMs: number;
}

interface Props {
  gridWidth: number;
  gridHeight: number;
  cellSize: number;
  onStatus?: (status: FrameStatus) => void;
  onMetrics?: (metrics: FrameMetrics) => void;
}

export const SimulationCanvas: React.FC<Props> = ({ gridWidth, gridHeight, cellSize, onStatus, onMetrics }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const onStatusRef = useRef(onStatus);
  onStatusRef.current = onStatus;
  const onMetricsRef = useRef(onMetrics);
  onMetricsRef.current = onMetrics;

  // Grid, session and input live for as long as the grid dimensions do.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    let renderer: Renderer | null = null;

    const grid = new LifeGrid(gridWidth, gridHeight, cellSize);
    const session = createSession();
    const pacer = new FramePacer(session.speed);
    const events: InputEvent[] = [];
    const pointer: PointerState = { x: 0, y: 0, primaryDown: false };

    const canvas = document.createElement("canvas");
    container.appendChild(canvas);

    function updatePointer(e: PointerEvent): void {
      const rect = canvas.getBoundingClientRect();
      pointer.x = e.clientX - rect.left;
      pointer.y = e.clientY - rect.top;
    }
    function onPointerDown(e: PointerEvent): void {
      if (e.button !== 0) return;
      updatePointer(e);
      pointer.primaryDown = true;
    }
    function onPointerUp(e: PointerEvent): void {
      if (e.button !== 0) return;
      pointer.primaryDown = false;
    }
    function onKeyDown(e: KeyboardEvent): void {
      // Keep SPACE from scrolling the page
      if (e.code === "Space") e.preventDefault();
      events.push({ type: "keydown", code: e.code });
    }
    function onPageHide(e: PageTransitionEvent): void {
      // A page kept in the back/forward cache comes back later; only a real unload quits.
      if (e.persisted) return;
      events.push({ type: "quit" });
    }

    canvas.addEventListener("pointerdown", onPointerDown);
    canvas.addEventListener("pointermove", updatePointer);
    window.addEventListener("pointerup", onPointerUp);
    window.addEventListener("keydown", onKeyDown);
    window.addEventListener("pagehide", onPageHide);

    function teardown(): void {
      destroyed = true;
      cancelAnimationFrame(rafId);
      canvas.removeEventListener("pointerdown", onPointerDown);
      canvas.removeEventListener("pointermove", updatePointer);
      window.removeEventListener("pointerup", onPointerUp);
      window.removeEventListener("keydown", onKeyDown);
      window.removeEventListener("pagehide", onPageHide);
      renderer?.destroy();
      renderer = null;
    }

    function tick(timestamp: number): void {
      if (destroyed || !renderer) return;

      pacer.targetFps = session.speed;
      if (pacer.accept(timestamp) === null) {
        rafId = requestAnimationFrame(tick);
        return;
      }

      const status = runFrame(grid, session, events, pointer);
      if (!status.running) {
        onStatusRef.current?.(status);
        teardown();
        return;
      }

      const metrics = renderer.update(grid);
      onStatusRef.current?.(status);
      onMetricsRef.current?.({ fps: pacer.actualFps, sceneUpdateTimeMs: metrics.sceneUpdateTimeMs });

      rafId = requestAnimationFrame(tick);
    }

    createLifeRenderer(canvas, grid).then((r) => {
      if (destroyed) {
        r.destroy();
        return;
      }
      renderer = r;
      const size = canvasSize(gridWidth, gridHeight, cellSize);
      r.resize(size.width, size.height);
      rafId = requestAnimationFrame(tick);
    }).catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      teardown();
      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, [gridWidth, gridHeight, cellSize]);

  return <div ref={containerRef} className="simulation-canvas" />;
};
