// --- Plane geometry ---

export type Complex = {
  re: number;
  im: number;
};

/** Rectangle of the complex plane mapped onto the grid. Always `xmin < xmax` and `ymin < ymax`. */
export type Bounds = {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
};

// --- Viewport ---

export type FractalMode = "mandelbrot" | "julia";

/** Banded (`modulo`) or gradient (`linear`) translation of iteration counts to table indices. */
export type MappingMode = "modulo" | "linear";

export type ViewportState = {
  bounds: Bounds;
  maxIter: number;
  mode: FractalMode;
  /** Only read in Julia mode. */
  juliaConstant: Complex;
  mappingMode: MappingMode;
  halfBlock: boolean;
};

// --- Computed data ---

/**
 * Escape counts for one viewport, row-major, `width * height` entries in `[0, maxIter]`.
 * A value of `maxIter` marks an interior point.
 *
 * Produced wholesale by one compute round and never written afterwards; a new
 * viewport gets a new grid.
 */
export type IterationGrid = {
  readonly width: number;
  readonly height: number;
  readonly maxIter: number;
  readonly data: Int32Array;
};

// --- Lookup tables ---

export type Palette = {
  /** The palette as typed, used when reconstructing the command line. */
  readonly symbols: string;
  /** One entry per display glyph (code point). */
  readonly glyphs: readonly string[];
  readonly custom: boolean;
};

/** 16 xterm-256 color indices, darkest escape first. */
export type ColorRamp = readonly number[];
