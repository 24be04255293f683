import { gridIndex, cellAtPixel, canvasSize } from "./grid-utils";

describe("grid-utils", () => {
  it("indexes cells row by row", () => {
    expect(gridIndex(0, 0, 5)).toBe(0);
    expect(gridIndex(4, 0, 5)).toBe(4);
    expect(gridIndex(3, 2, 5)).toBe(13);
  });

  it("maps pixels to cells by integer division", () => {
    expect(cellAtPixel(19, 17, 8)).toEqual({ x: 2, y: 2 });
    expect(cellAtPixel(7, 8, 8)).toEqual({ x: 0, y: 1 });
    expect(cellAtPixel(-1, 0, 8)).toEqual({ x: -1, y: 0 });
  });

  it("sizes the canvas to the grid", () => {
    expect(canvasSize(100, 100, 8)).toEqual({ width: 800, height: 800 });
    expect(canvasSize(30, 20, 4)).toEqual({ width: 120, height: 80 });
  });
});
