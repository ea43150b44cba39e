/**
 * Interface that every escape-time kernel implements.
 * Implementations hold no mutable state, so one instance can serve every row
 * of a compute round and can be rebuilt cheaply inside a worker thread.
 */
export interface FractalAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  /** Optional description explaining the algorithm */
  readonly description?: string;

  /**
   * Computes the escape-time iteration count for a point in the complex plane.
   *
   * @param real - Real component of the sampled point (x-coordinate)
   * @param imag - Imaginary component of the sampled point (y-coordinate)
   * @param maxIterations - Iteration cap; returned unchanged for points that never escape
   * @returns Number of iterations completed before `|z|² > 4`
   */
  computePoint(real: number, imag: number, maxIterations: number): number;
}

/** Squared escape radius: a point has escaped once `|z|² > 4`. */
export const ESCAPE_RADIUS_SQUARED = 4;
