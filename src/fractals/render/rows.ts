import { availableParallelism } from "node:os";

import { MAX_WORKERS } from "../../config.js";

/** Half-open range `[startRow, endRow)` of grid rows handled by one worker. */
export interface RowRange {
  startRow: number;
  endRow: number;
}

/**
 * Number of workers for a grid of `height` rows.
 *
 * A missing or zero request means "one per logical core". The result is
 * clamped to [1, min(MAX_WORKERS, height)] so no worker gets an empty range.
 */
export function resolveWorkerCount(
  requested: number | undefined,
  height: number,
  cores: number = availableParallelism()
): number {
  const wanted = requested && requested > 0 ? requested : cores;
  return Math.max(1, Math.min(wanted, MAX_WORKERS, height));
}

/**
 * Splits `[0, height)` into `workers` contiguous ranges.
 *
 * Every range gets `floor(height / workers)` rows and the first
 * `height % workers` ranges get one more, so the ranges cover every row
 * exactly once.
 *
 * @example
 * partitionRows(10, 3); // [0,4) [4,7) [7,10)
 */
export function partitionRows(height: number, workers: number): RowRange[] {
  const rowsEach = Math.floor(height / workers);
  const extraRows = height % workers;
  const ranges: RowRange[] = [];

  let startRow = 0;
  for (let i = 0; i < workers; i++) {
    const rowCount = rowsEach + (i < extraRows ? 1 : 0);
    ranges.push({ startRow, endRow: startRow + rowCount });
    startRow += rowCount;
  }

  return ranges;
}
