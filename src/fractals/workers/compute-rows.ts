// ABOUTME: Core row computation shared by worker threads and the synchronous fallback
// ABOUTME: Runs the escape-time kernel over a row range of the shared grid

import { performance } from "node:perf_hooks";

import { columnToReal, rowToImaginary } from "../../lib/coordinates.js";
import { createAlgorithm } from "../algorithms/index.js";
import type { RowTask, RowTaskResult } from "./types.js";

/**
 * Computes escape counts for every pixel in `task.range` and writes them into
 * the shared grid buffer.
 *
 * Rows outside the range are never touched, which is what lets several
 * workers fill one buffer without locking.
 */
export function computeRows(task: RowTask): RowTaskResult {
  const startTime = performance.now();
  const { range, width, height, bounds, maxIter } = task;
  const output = new Int32Array(task.buffer);
  const algorithm = createAlgorithm(task.mode, task.juliaConstant);

  for (let row = range.startRow; row < range.endRow; row++) {
    const imag = rowToImaginary(row, bounds, height);
    const offset = row * width;

    for (let col = 0; col < width; col++) {
      output[offset + col] = algorithm.computePoint(columnToReal(col, bounds, width), imag, maxIter);
    }
  }

  return { range, computeTime: performance.now() - startTime };
}
