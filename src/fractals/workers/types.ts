// ABOUTME: Type definitions for worker thread communication
// ABOUTME: Defines the row task a worker receives and what it reports back

import type { RowRange } from "../render/rows.js";
import type { Bounds, Complex, FractalMode, ViewportState } from "../types.js";

/**
 * Everything a worker needs to fill its rows. Sent by structured clone, so the
 * worker owns a private copy of the scalars; only `buffer` is shared.
 */
export interface RowTask {
  /** Rows this worker writes */
  range: RowRange;
  /** Full grid width */
  width: number;
  /** Full grid height (needed for the y step) */
  height: number;
  bounds: Bounds;
  maxIter: number;
  mode: FractalMode;
  juliaConstant: Complex;
  /**
   * Backing store of the whole grid, `width * height` Int32 values.
   * A worker writes only the rows in `range`.
   */
  buffer: SharedArrayBuffer;
}

/**
 * Result returned once a worker has written its rows.
 */
export interface RowTaskResult {
  range: RowRange;
  /** Time spent computing, in milliseconds */
  computeTime: number;
}

/**
 * Builds the task for one range from the current viewport. Copies the bounds
 * and constant so later state changes cannot leak into a running round.
 */
export function createRowTask(
  viewport: ViewportState,
  range: RowRange,
  width: number,
  height: number,
  buffer: SharedArrayBuffer
): RowTask {
  return {
    range: { ...range },
    width,
    height,
    bounds: { ...viewport.bounds },
    maxIter: viewport.maxIter,
    mode: viewport.mode,
    juliaConstant: { ...viewport.juliaConstant },
    buffer,
  };
}
