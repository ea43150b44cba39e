// ABOUTME: Mandelbrot set algorithm implementation
// ABOUTME: Computes escape-time iterations for points in the complex plane

import { ESCAPE_RADIUS_SQUARED, type FractalAlgorithm } from "./base.js";

/**
 * Mandelbrot Set algorithm implementation.
 *
 * The Mandelbrot set is defined as the set of complex numbers c for which
 * the function f(z) = z² + c does not diverge when iterated from z = 0.
 *
 * For each point c in the complex plane, we iterate:
 *   z₀ = 0
 *   z_{n+1} = z_n² + c
 *
 * We count how many iterations it takes for |z|² to exceed 4.
 * Points that never escape return exactly maxIterations.
 */
export class MandelbrotAlgorithm implements FractalAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  computePoint(real: number, imag: number, maxIterations: number): number {
    let zr = 0;
    let zi = 0;
    let iter = 0;

    while (iter < maxIterations) {
      const zr2 = zr * zr;
      const zi2 = zi * zi;
      if (zr2 + zi2 > ESCAPE_RADIUS_SQUARED) break;

      // (zr + zi*i)² = zr² - zi² + 2*zr*zi*i
      zi = 2 * zr * zi + imag;
      zr = zr2 - zi2 + real;
      iter++;
    }

    return iter;
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();
