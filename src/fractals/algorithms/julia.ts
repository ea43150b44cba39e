import type { Complex } from "../types.js";
import { ESCAPE_RADIUS_SQUARED, type FractalAlgorithm } from "./base.js";

/**
 * Julia set for a fixed constant c: the sampled point is the starting z,
 * and every step applies z → z² + c.
 */
export class JuliaAlgorithm implements FractalAlgorithm {
  readonly name = "Julia Set";
  readonly description: string;
  private readonly cr: number;
  private readonly ci: number;

  constructor(constant: Complex) {
    this.cr = constant.re;
    this.ci = constant.im;
    this.description = `Julia set: z → z² + (${constant.re} + ${constant.im}i), starting from z = point`;
  }

  computePoint(real: number, imag: number, maxIterations: number): number {
    let zr = real;
    let zi = imag;
    let iter = 0;

    while (iter < maxIterations) {
      const zr2 = zr * zr;
      const zi2 = zi * zi;
      if (zr2 + zi2 > ESCAPE_RADIUS_SQUARED) break;

      zi = 2 * zr * zi + this.ci;
      zr = zr2 - zi2 + this.cr;
      iter++;
    }

    return iter;
  }
}
