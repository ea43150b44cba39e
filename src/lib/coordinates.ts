import type { Bounds } from "../fractals/types.js";

/** Plane distance between neighbouring samples on each axis. */
export const pixelSize = (bounds: Bounds, width: number, height: number) => ({
  x: (bounds.xmax - bounds.xmin) / width,
  y: (bounds.ymax - bounds.ymin) / height,
});

/**
 * Column to real coordinate. Column 0 samples `xmin`.
 */
export const columnToReal = (col: number, bounds: Bounds, width: number): number =>
  bounds.xmin + col * ((bounds.xmax - bounds.xmin) / width);

/**
 * Row to imaginary coordinate. Row 0 is the top of the grid and samples `ymax`.
 */
export const rowToImaginary = (row: number, bounds: Bounds, height: number): number =>
  bounds.ymax - row * ((bounds.ymax - bounds.ymin) / height);

/**
 * Aligns the bounds to a lattice of pixel-sized steps anchored at the origin.
 *
 * `xmin` moves down to the nearest multiple of the pixel width and `xmax`
 * moves by the same delta, so the extent is kept (up to rounding); the same
 * happens on y. Panning by fractions of the view therefore keeps sampling
 * the same lattice points as the neighbouring view.
 */
export const snapToGrid = (bounds: Bounds, width: number, height: number): Bounds => {
  const px = pixelSize(bounds, width, height);

  const xmin = Math.floor(bounds.xmin / px.x) * px.x;
  const ymin = Math.floor(bounds.ymin / px.y) * px.y;

  return {
    xmin,
    xmax: bounds.xmax + (xmin - bounds.xmin),
    ymin,
    ymax: bounds.ymax + (ymin - bounds.ymin),
  };
};
