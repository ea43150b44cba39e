import { describe, expect, it } from "vitest";

import { columnToReal, pixelSize, rowToImaginary, snapToGrid } from "./coordinates.js";

describe("coordinates", () => {
  describe("pixel mapping", () => {
    const bounds = { xmin: -2, xmax: 2, ymin: -1, ymax: 1 };

    it("should sample xmin at column 0 and step by the pixel width", () => {
      expect(columnToReal(0, bounds, 8)).toBe(-2);
      expect(columnToReal(4, bounds, 8)).toBe(0);
      expect(columnToReal(7, bounds, 8)).toBe(1.5);
    });

    it("should sample ymax at row 0 and move down", () => {
      expect(rowToImaginary(0, bounds, 4)).toBe(1);
      expect(rowToImaginary(2, bounds, 4)).toBe(0);
      expect(rowToImaginary(3, bounds, 4)).toBe(-0.5);
    });

    it("should report the pixel size per axis", () => {
      expect(pixelSize(bounds, 8, 4)).toEqual({ x: 0.5, y: 0.5 });
    });
  });

  describe("snapToGrid", () => {
    it("should snap xmin down to the lattice and shift xmax by the same delta", () => {
      const snapped = snapToGrid({ xmin: -1.95, xmax: 1.05, ymin: -1, ymax: 1 }, 3, 2);
      expect(snapped.xmin).toBe(-2);
      expect(snapped.xmax).toBeCloseTo(1.0, 12);
      expect(snapped.xmax - snapped.xmin).toBeCloseTo(3, 12);
    });

    it("should keep the extent exactly when the values are representable", () => {
      const snapped = snapToGrid({ xmin: -1.75, xmax: 1.25, ymin: -0.75, ymax: 1.25 }, 3, 4);
      expect(snapped).toEqual({ xmin: -2, xmax: 1, ymin: -1, ymax: 1 });
    });

    it("should leave aligned bounds untouched", () => {
      const bounds = { xmin: -2, xmax: 1, ymin: -1, ymax: 1 };
      expect(snapToGrid(bounds, 3, 4)).toEqual(bounds);
    });

    it("should sample the same lattice after panning by a fraction of a pixel", () => {
      const first = snapToGrid({ xmin: -2, xmax: 2, ymin: -2, ymax: 2 }, 4, 4);
      const panned = snapToGrid({ xmin: -1.9, xmax: 2.1, ymin: -1.9, ymax: 2.1 }, 4, 4);
      expect(panned.xmin).toBe(first.xmin);
      expect(panned.ymin).toBe(first.ymin);
    });
  });
});
