// ABOUTME: Pure state transitions for every navigation command
// ABOUTME: Each transition says whether the iteration grid has to be recomputed

import {
  DEFAULT_BOUNDS,
  DEFAULT_ITERATIONS,
  JULIA_BOUNDS,
  MANDELBROT_RETURN_HALF_HEIGHT,
  MANDELBROT_RETURN_HALF_WIDTH,
  MAX_ITERATIONS,
  MIN_ITERATIONS,
  PAN_FRACTION,
  ZOOM_FRACTION,
} from "../config.js";
import type { Bounds, ViewportState } from "../fractals/types.js";
import type { AppState, DisplayState } from "./app-state.js";

export type Transition = {
  state: AppState;
  recompute: boolean;
};

export type Direction = "N" | "S" | "E" | "W" | "NE" | "NW" | "SE" | "SW";
export type Axis = "x" | "y";

export type NavigationCommand =
  | { type: "pan"; direction: Direction }
  | { type: "zoomIn" }
  | { type: "zoomOut" }
  | { type: "stretchAxis"; axis: Axis; direction: "in" | "out" }
  | { type: "iterations"; delta: number }
  | { type: "cyclePalette"; step: number }
  | { type: "cycleColorScheme"; step: number }
  | { type: "toggleColor" }
  | { type: "toggleMappingMode" }
  | { type: "toggleJulia" }
  | { type: "toggleHalfBlock" }
  | { type: "resetView" };

export const ZOOM_IN = 1 - ZOOM_FRACTION;
export const ZOOM_OUT = 1 + ZOOM_FRACTION;

// North is +y: row 0 of the grid shows ymax.
const PAN_VECTORS: Record<Direction, readonly [number, number]> = {
  N: [0, 1],
  S: [0, -1],
  E: [1, 0],
  W: [-1, 0],
  NE: [1, 1],
  NW: [-1, 1],
  SE: [1, -1],
  SW: [-1, -1],
};

const withViewport = (state: AppState, viewport: Partial<ViewportState>): AppState => ({
  ...state,
  viewport: { ...state.viewport, ...viewport },
});

const withDisplay = (state: AppState, display: Partial<DisplayState>): AppState => ({
  ...state,
  display: { ...state.display, ...display },
});

const recompute = (state: AppState): Transition => ({ state, recompute: true });
const redraw = (state: AppState): Transition => ({ state, recompute: false });

const wrapIndex = (index: number, step: number, count: number) => (((index + step) % count) + count) % count;

const center = (bounds: Bounds) => ({
  x: (bounds.xmin + bounds.xmax) / 2,
  y: (bounds.ymin + bounds.ymax) / 2,
});

/**
 * Shifts the view by fractions of its own extent.
 */
export function pan(state: AppState, dxFrac: number, dyFrac: number): Transition {
  const { xmin, xmax, ymin, ymax } = state.viewport.bounds;
  const dx = (xmax - xmin) * dxFrac;
  const dy = (ymax - ymin) * dyFrac;
  return recompute(
    withViewport(state, { bounds: { xmin: xmin + dx, xmax: xmax + dx, ymin: ymin + dy, ymax: ymax + dy } })
  );
}

export function panDirection(state: AppState, direction: Direction): Transition {
  const [x, y] = PAN_VECTORS[direction];
  return pan(state, x * PAN_FRACTION, y * PAN_FRACTION);
}

/**
 * Rescales both axes around the view center. A factor below 1 zooms in.
 */
export function zoomBoth(state: AppState, factor: number): Transition {
  return zoomAxis(zoomAxis(state, "x", factor).state, "y", factor);
}

/**
 * Rescales one axis around the view center, stretching or squashing the image.
 */
export function zoomAxis(state: AppState, axis: Axis, factor: number): Transition {
  const bounds = state.viewport.bounds;
  const { x, y } = center(bounds);

  if (axis === "x") {
    const halfWidth = ((bounds.xmax - bounds.xmin) * factor) / 2;
    return recompute(withViewport(state, { bounds: { ...bounds, xmin: x - halfWidth, xmax: x + halfWidth } }));
  }
  const halfHeight = ((bounds.ymax - bounds.ymin) * factor) / 2;
  return recompute(withViewport(state, { bounds: { ...bounds, ymin: y - halfHeight, ymax: y + halfHeight } }));
}

/**
 * Changes the iteration cap, clamped to the allowed range. Only a cap that
 * actually changed needs a new grid.
 */
export function adjustIterations(state: AppState, delta: number): Transition {
  const maxIter = Math.min(MAX_ITERATIONS, Math.max(MIN_ITERATIONS, state.viewport.maxIter + delta));
  if (maxIter === state.viewport.maxIter) {
    return redraw(state);
  }
  return recompute(withViewport(state, { maxIter }));
}

/**
 * Back to the default Mandelbrot view. The Julia constant is kept.
 */
export function resetView(state: AppState): Transition {
  return recompute(
    withViewport(state, { bounds: { ...DEFAULT_BOUNDS }, maxIter: DEFAULT_ITERATIONS, mode: "mandelbrot" })
  );
}

/**
 * Entering Julia mode takes the view center as the constant and frames the
 * whole set. Leaving returns to a fixed-size Mandelbrot view centered on the
 * constant, not to the view that was left.
 */
export function toggleJulia(state: AppState): Transition {
  if (state.viewport.mode === "mandelbrot") {
    const { x, y } = center(state.viewport.bounds);
    return recompute(
      withViewport(state, { mode: "julia", juliaConstant: { re: x, im: y }, bounds: { ...JULIA_BOUNDS } })
    );
  }

  const { re, im } = state.viewport.juliaConstant;
  return recompute(
    withViewport(state, {
      mode: "mandelbrot",
      bounds: {
        xmin: re - MANDELBROT_RETURN_HALF_WIDTH,
        xmax: re + MANDELBROT_RETURN_HALF_WIDTH,
        ymin: im - MANDELBROT_RETURN_HALF_HEIGHT,
        ymax: im + MANDELBROT_RETURN_HALF_HEIGHT,
      },
    })
  );
}

export function cyclePalette(state: AppState, step: number): Transition {
  return redraw(
    withDisplay(state, { paletteIndex: wrapIndex(state.display.paletteIndex, step, state.palettes.length) })
  );
}

export function cycleColorScheme(state: AppState, step: number): Transition {
  return redraw(
    withDisplay(state, {
      colorSchemeIndex: wrapIndex(state.display.colorSchemeIndex, step, state.colorSchemes.length),
    })
  );
}

export function toggleColor(state: AppState): Transition {
  return redraw(withDisplay(state, { useColor: !state.display.useColor }));
}

export function toggleMappingMode(state: AppState): Transition {
  return redraw(
    withViewport(state, { mappingMode: state.viewport.mappingMode === "modulo" ? "linear" : "modulo" })
  );
}

/**
 * Display-only at this level. Half-block mode needs twice the grid rows, which
 * the session notices as a resolution change.
 */
export function toggleHalfBlock(state: AppState): Transition {
  return redraw(withViewport(state, { halfBlock: !state.viewport.halfBlock }));
}

export function applyCommand(state: AppState, command: NavigationCommand): Transition {
  switch (command.type) {
    case "pan":
      return panDirection(state, command.direction);
    case "zoomIn":
      return zoomBoth(state, ZOOM_IN);
    case "zoomOut":
      return zoomBoth(state, ZOOM_OUT);
    case "stretchAxis":
      return zoomAxis(state, command.axis, command.direction === "in" ? ZOOM_IN : ZOOM_OUT);
    case "iterations":
      return adjustIterations(state, command.delta);
    case "cyclePalette":
      return cyclePalette(state, command.step);
    case "cycleColorScheme":
      return cycleColorScheme(state, command.step);
    case "toggleColor":
      return toggleColor(state);
    case "toggleMappingMode":
      return toggleMappingMode(state);
    case "toggleJulia":
      return toggleJulia(state);
    case "toggleHalfBlock":
      return toggleHalfBlock(state);
    case "resetView":
      return resetView(state);
  }
}
