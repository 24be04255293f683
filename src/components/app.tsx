import React, { useState } from "react";
import { SimulationCanvas, FrameMetrics } from "./simulation-canvas";
import type { FrameStatus } from "../simulation/frame-loop";
import { GRID_WIDTH, GRID_HEIGHT, CELL_SIZE, INITIAL_SPEED, TEXT_COLOR } from "../constants";
import { formatStatusLine, statusTextLayout, KEY_BINDING_LEGEND } from "../utils/status-utils";
import { canvasSize } from "../utils/grid-utils";
import { hexColor } from "../utils/color-utils";

import "./app.scss";

const INITIAL_STATUS: FrameStatus = {
  paused: true,
  speed: INITIAL_SPEED,
  spawning: false,
  aliveCount: 0,
  running: true,
};

export const App = () => {
  const [status, setStatus] = useState<FrameStatus>(INITIAL_STATUS);
  const [metrics, setMetrics] = useState<FrameMetrics | null>(null);

  const size = canvasSize(GRID_WIDTH, GRID_HEIGHT, CELL_SIZE);
  const layout = statusTextLayout(GRID_WIDTH, GRID_HEIGHT, CELL_SIZE);
  const textStyle = { left: layout.left, fontSize: layout.fontSize, color: hexColor(TEXT_COLOR) };

  return (
    <div className="app">
      <div className="canvas-container" style={{ width: size.width, height: size.height }}>
        <SimulationCanvas
          gridWidth={GRID_WIDTH}
          gridHeight={GRID_HEIGHT}
          cellSize={CELL_SIZE}
          onStatus={setStatus}
          onMetrics={setMetrics}
        />
        {/* Status overlay */}
        <div className="status-line" style={{ ...textStyle, top: layout.statusTop }}>
          {formatStatusLine(status)}
        </div>
        {metrics && (
          <div className="perf-line" style={{ ...textStyle, top: layout.statusTop + layout.fontSize + 4 }}>
            {Math.round(metrics.fps)} fps | draw {metrics.sceneUpdateTimeMs.toFixed(1)}ms
          </div>
        )}
        <div className="legend-line" style={{ ...textStyle, top: layout.legendTop }}>
          {KEY_BINDING_LEGEND}
        </div>
        {!status.running && <div className="stopped-overlay">Simulation stopped</div>}
      </div>
    </div>
  );
};
