// ABOUTME: Application-wide limits and defaults
// ABOUTME: Shared by the CLI boundary checks, navigation and the worker pool

import type { Bounds } from "./fractals/types.js";

export const PROGRAM_NAME = "termbrot";

/** Upper bound on worker threads, whatever the user or the machine asks for. */
export const MAX_WORKERS = 256;

export const MIN_ITERATIONS = 1;
export const MAX_ITERATIONS = 10000;
export const DEFAULT_ITERATIONS = 30;
export const ITERATION_STEP = 5;

export const MIN_PALETTE_LENGTH = 2;
export const MAX_PALETTE_LENGTH = 256;

/** Built-in palette selected when none is given (0-based). */
export const DEFAULT_PALETTE_INDEX = 1;
export const DEFAULT_COLOR_SCHEME_INDEX = 0;

export const PAN_FRACTION = 0.1;
export const ZOOM_FRACTION = 0.3;

export const DEFAULT_BOUNDS: Bounds = { xmin: -2.0, xmax: 1.0, ymin: -1.0, ymax: 1.0 };

/** Framing used when switching into Julia mode. */
export const JULIA_BOUNDS: Bounds = { xmin: -2.0, xmax: 2.0, ymin: -1.5, ymax: 1.5 };

/** Half extents used when leaving Julia mode, centered on the Julia constant. */
export const MANDELBROT_RETURN_HALF_WIDTH = 1.5;
export const MANDELBROT_RETURN_HALF_HEIGHT = 1.0;

export const DEFAULT_JULIA_CONSTANT = { re: -0.7, im: 0.27015 };

export const MIN_TERMINAL_SIZE = 4;
export const MAX_TERMINAL_WIDTH = 1000;
export const MAX_TERMINAL_HEIGHT = 2000;
/** Terminal rows kept free for the header line and the cursor row. */
export const HEADER_ROWS = 2;

export const WORKER_START_TIMEOUT_MS = 5000;
