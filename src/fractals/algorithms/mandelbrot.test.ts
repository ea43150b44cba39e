import { describe, expect, it } from "vitest";
import { MandelbrotAlgorithm, mandelbrotAlgorithm } from "./mandelbrot.js";

describe("MandelbrotAlgorithm", () => {
  const algorithm = new MandelbrotAlgorithm();
  const maxIterations = 1000;

  describe("metadata", () => {
    it("should have correct name", () => {
      expect(algorithm.name).toBe("Mandelbrot Set");
    });

    it("should have a description", () => {
      expect(typeof algorithm.description).toBe("string");
    });
  });

  describe("computePoint", () => {
    it("should return maxIterations for the origin", () => {
      expect(algorithm.computePoint(0, 0, 100)).toBe(100);
    });

    it("should return maxIterations for point at (-1, 0) (in the set)", () => {
      expect(algorithm.computePoint(-1, 0, maxIterations)).toBe(maxIterations);
    });

    it("should escape immediately when |c| > 2", () => {
      const iter = algorithm.computePoint(3, 0, 50);
      expect(iter).toBeLessThanOrEqual(2);
      expect(iter).toBe(1);
    });

    it("should escape after one step for point at (2, 2)", () => {
      expect(algorithm.computePoint(2, 2, maxIterations)).toBe(1);
    });

    it("should count the iterations before escape for (0.4, 0.4)", () => {
      expect(algorithm.computePoint(0.4, 0.4, maxIterations)).toBe(9);
    });

    it("should escape for point at (0.5, 0)", () => {
      expect(algorithm.computePoint(0.5, 0, maxIterations)).toBe(5);
    });

    it("should take many iterations near the boundary at (-0.75, 0.1)", () => {
      expect(algorithm.computePoint(-0.75, 0.1, maxIterations)).toBe(33);
    });

    it("should treat |z|² == 4 as not yet escaped", () => {
      // c = -2 settles on z = 2, where |z|² is exactly 4
      expect(algorithm.computePoint(-2, 0, 100)).toBe(100);
    });

    it("should respect maxIterations parameter", () => {
      expect(algorithm.computePoint(0, 0, 10)).toBe(10);
      expect(algorithm.computePoint(0, 0, 1)).toBe(1);
      expect(algorithm.computePoint(0, 0, 10000)).toBe(10000);
    });
  });

  describe("default instance", () => {
    it("should export a default instance", () => {
      expect(mandelbrotAlgorithm).toBeInstanceOf(MandelbrotAlgorithm);
    });

    it("should work the same as a new instance", () => {
      expect(mandelbrotAlgorithm.computePoint(0.3, 0.3, maxIterations)).toBe(
        algorithm.computePoint(0.3, 0.3, maxIterations)
      );
    });
  });
});
