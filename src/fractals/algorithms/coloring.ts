// ABOUTME: Maps escape counts to palette glyphs and terminal colors
// ABOUTME: Pure arithmetic over the iteration grid, so switching palettes never recomputes

import type { ColorRamp, MappingMode, Palette } from "../types.js";

/** Index returned for interior points: no glyph, no color. */
export const BACKGROUND = -1;

/** Glyph written for background cells. */
export const FILL_GLYPH = " ";

/** First entry of the xterm-256 grayscale ramp (232-255). */
const GRAYSCALE_BASE = 232;
const GRAYSCALE_LEVELS = 24;

/**
 * Converts an iteration count into an index into a table of `length` entries.
 *
 * - `n >= maxIterations`: the point is interior, returns {@link BACKGROUND}
 * - modulo: `n mod length`, cycling bands
 * - linear: `floor(n * length / maxIterations)`, a gradient by escape speed
 *
 * @example
 * iterationToIndex(7, 30, 5, "modulo"); // 2
 * iterationToIndex(7, 30, 5, "linear"); // 1
 */
export function iterationToIndex(
  iter: number,
  maxIterations: number,
  length: number,
  mode: MappingMode
): number {
  if (iter >= maxIterations) return BACKGROUND;
  return mode === "modulo" ? iter % length : Math.floor((iter * length) / maxIterations);
}

export function iterationToGlyph(
  iter: number,
  maxIterations: number,
  palette: Palette,
  mode: MappingMode
): string {
  const index = iterationToIndex(iter, maxIterations, palette.glyphs.length, mode);
  return index === BACKGROUND ? FILL_GLYPH : palette.glyphs[index];
}

/**
 * Looks up the ramp color for an iteration count.
 *
 * @returns An xterm-256 color index, or {@link BACKGROUND} for interior points
 */
export function iterationToColor(
  iter: number,
  maxIterations: number,
  ramp: ColorRamp,
  mode: MappingMode
): number {
  const index = iterationToIndex(iter, maxIterations, ramp.length, mode);
  return index === BACKGROUND ? BACKGROUND : ramp[index];
}

/**
 * Grayscale stand-in used when color is switched off but a cell still needs
 * two shades (half-block rendering). Derived from the count, not from a ramp.
 */
export function grayscaleColor(iter: number): number {
  return GRAYSCALE_BASE + (iter % GRAYSCALE_LEVELS);
}
