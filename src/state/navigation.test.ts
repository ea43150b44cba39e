import { describe, expect, it } from "vitest";

import { DEFAULT_BOUNDS, JULIA_BOUNDS, MAX_ITERATIONS } from "../config.js";
import type { Bounds } from "../fractals/types.js";
import { type AppState, createAppState } from "./app-state.js";
import {
  adjustIterations,
  applyCommand,
  cycleColorScheme,
  cyclePalette,
  panDirection,
  resetView,
  toggleColor,
  toggleHalfBlock,
  toggleJulia,
  toggleMappingMode,
  zoomAxis,
  zoomBoth,
} from "./navigation.js";

function expectBounds(actual: Bounds, expected: Bounds) {
  expect(actual.xmin).toBeCloseTo(expected.xmin, 12);
  expect(actual.xmax).toBeCloseTo(expected.xmax, 12);
  expect(actual.ymin).toBeCloseTo(expected.ymin, 12);
  expect(actual.ymax).toBeCloseTo(expected.ymax, 12);
}

describe("navigation", () => {
  const initial: AppState = createAppState();

  describe("pan", () => {
    it("should move east by a tenth of the width", () => {
      const { state, recompute } = panDirection(initial, "E");
      expect(recompute).toBe(true);
      expectBounds(state.viewport.bounds, { xmin: -1.7, xmax: 1.3, ymin: -1, ymax: 1 });
    });

    it("should treat north as positive imaginary", () => {
      const { state } = panDirection(initial, "N");
      expectBounds(state.viewport.bounds, { xmin: -2, xmax: 1, ymin: -0.8, ymax: 1.2 });
    });

    it("should move diagonally on both axes", () => {
      const { state } = panDirection(initial, "SW");
      expectBounds(state.viewport.bounds, { xmin: -2.3, xmax: 0.7, ymin: -1.2, ymax: 0.8 });
    });

    it("should leave the previous state untouched", () => {
      panDirection(initial, "E");
      expect(initial.viewport.bounds).toEqual(DEFAULT_BOUNDS);
    });
  });

  describe("zoom", () => {
    it("should zoom both axes around the center", () => {
      const { state, recompute } = zoomBoth(initial, 0.7);
      expect(recompute).toBe(true);
      expectBounds(state.viewport.bounds, { xmin: -1.55, xmax: 0.55, ymin: -0.7, ymax: 0.7 });
    });

    it("should stretch a single axis", () => {
      const { state } = zoomAxis(initial, "y", 0.7);
      expectBounds(state.viewport.bounds, { xmin: -2, xmax: 1, ymin: -0.7, ymax: 0.7 });
    });
  });

  describe("adjustIterations", () => {
    it("should raise the cap and ask for a new grid", () => {
      const { state, recompute } = adjustIterations(initial, 5);
      expect(state.viewport.maxIter).toBe(35);
      expect(recompute).toBe(true);
    });

    it("should clamp to the lower bound", () => {
      const low = adjustIterations(initial, -27).state;
      expect(low.viewport.maxIter).toBe(3);
      expect(adjustIterations(low, -5).state.viewport.maxIter).toBe(1);
    });

    it("should not recompute when the clamped cap is unchanged", () => {
      const capped = createAppState({ maxIter: MAX_ITERATIONS });
      const { state, recompute } = adjustIterations(capped, 5);
      expect(recompute).toBe(false);
      expect(state.viewport.maxIter).toBe(MAX_ITERATIONS);
    });
  });

  describe("resetView", () => {
    it("should restore the default view and keep the Julia constant", () => {
      const julia = createAppState({ juliaConstant: { re: 0.3, im: 0.5 }, maxIter: 200, bounds: JULIA_BOUNDS });
      const { state, recompute } = resetView(julia);

      expect(recompute).toBe(true);
      expect(state.viewport.bounds).toEqual(DEFAULT_BOUNDS);
      expect(state.viewport.maxIter).toBe(30);
      expect(state.viewport.mode).toBe("mandelbrot");
      expect(state.viewport.juliaConstant).toEqual({ re: 0.3, im: 0.5 });
    });
  });

  describe("toggleJulia", () => {
    it("should take the view center as the constant", () => {
      const { state, recompute } = toggleJulia(initial);
      expect(recompute).toBe(true);
      expect(state.viewport.mode).toBe("julia");
      expect(state.viewport.juliaConstant).toEqual({ re: -0.5, im: 0 });
      expect(state.viewport.bounds).toEqual(JULIA_BOUNDS);
    });

    it("should return to a fixed-size view around the constant, not the view that was left", () => {
      const zoomed = zoomBoth(initial, 0.7).state;
      const back = toggleJulia(toggleJulia(zoomed).state).state;

      expect(back.viewport.mode).toBe("mandelbrot");
      expectBounds(back.viewport.bounds, { xmin: -2, xmax: 1, ymin: -1, ymax: 1 });
      expect(back.viewport.bounds.xmax - back.viewport.bounds.xmin).not.toBeCloseTo(2.1, 6);
    });
  });

  describe("display toggles", () => {
    it("should cycle palettes with wrap-around", () => {
      expect(cyclePalette(initial, -1).state.display.paletteIndex).toBe(0);
      const first = cyclePalette(initial, -1).state;
      expect(cyclePalette(first, -1).state.display.paletteIndex).toBe(15);
    });

    it("should include the custom palette in the cycle", () => {
      const custom = createAppState({ symbols: "ab" });
      expect(custom.display.paletteIndex).toBe(16);
      expect(cyclePalette(custom, 1).state.display.paletteIndex).toBe(0);
    });

    it("should cycle color schemes with wrap-around", () => {
      const { state, recompute } = cycleColorScheme(initial, -1);
      expect(state.display.colorSchemeIndex).toBe(15);
      expect(recompute).toBe(false);
    });

    it("should toggle color, mapping mode and half-block without recomputing", () => {
      expect(toggleColor(initial)).toMatchObject({ recompute: false, state: { display: { useColor: false } } });
      expect(toggleMappingMode(initial)).toMatchObject({
        recompute: false,
        state: { viewport: { mappingMode: "linear" } },
      });
      expect(toggleHalfBlock(initial)).toMatchObject({ recompute: false, state: { viewport: { halfBlock: true } } });
    });
  });

  describe("applyCommand", () => {
    it("should dispatch axis stretching", () => {
      const { state } = applyCommand(initial, { type: "stretchAxis", axis: "x", direction: "out" });
      expectBounds(state.viewport.bounds, { xmin: -2.45, xmax: 1.45, ymin: -1, ymax: 1 });
    });

    it("should dispatch zoom out", () => {
      const { state } = applyCommand(initial, { type: "zoomOut" });
      expectBounds(state.viewport.bounds, { xmin: -2.45, xmax: 1.45, ymin: -1.3, ymax: 1.3 });
    });

    it("should dispatch iteration changes", () => {
      expect(applyCommand(initial, { type: "iterations", delta: -5 }).state.viewport.maxIter).toBe(25);
    });
  });
});
