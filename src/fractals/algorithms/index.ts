import type { Complex, FractalMode } from "../types.js";
import type { FractalAlgorithm } from "./base.js";
import { JuliaAlgorithm } from "./julia.js";
import { mandelbrotAlgorithm } from "./mandelbrot.js";

export type { FractalAlgorithm } from "./base.js";
export { JuliaAlgorithm } from "./julia.js";
export { MandelbrotAlgorithm, mandelbrotAlgorithm } from "./mandelbrot.js";

/**
 * Picks the kernel for a fractal mode. The constant is ignored in Mandelbrot mode.
 */
export function createAlgorithm(mode: FractalMode, juliaConstant: Complex): FractalAlgorithm {
  return mode === "julia" ? new JuliaAlgorithm(juliaConstant) : mandelbrotAlgorithm;
}

/**
 * Escape-time count for a single coordinate.
 *
 * @example
 * escapeTime(0, 0, "mandelbrot", { re: 0, im: 0 }, 100); // 100, the origin never escapes
 */
export function escapeTime(
  real: number,
  imag: number,
  mode: FractalMode,
  juliaConstant: Complex,
  maxIterations: number
): number {
  return createAlgorithm(mode, juliaConstant).computePoint(real, imag, maxIterations);
}
