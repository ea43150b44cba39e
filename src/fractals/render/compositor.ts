// ABOUTME: Turns an iteration grid into ANSI terminal text
// ABOUTME: Standard (one glyph per cell) and half-block (two rows per line) strategies

import {
  BACKGROUND,
  FILL_GLYPH,
  grayscaleColor,
  iterationToColor,
  iterationToGlyph,
} from "../algorithms/coloring.js";
import type { ColorRamp, IterationGrid, MappingMode, Palette } from "../types.js";

/** Everything that affects how a grid looks but not how it was computed. */
export interface DisplayConfig {
  palette: Palette;
  ramp: ColorRamp;
  color: boolean;
  mappingMode: MappingMode;
  halfBlock: boolean;
}

export const RESET = "\x1b[0m";
export const UPPER_HALF = "▀";
export const LOWER_HALF = "▄";
export const FULL_BLOCK = "█";

const ROW_END = `${RESET}\n`;

export const foreground = (color: number) => `\x1b[38;5;${color}m`;

/**
 * One glyph per cell.
 *
 * With color on, a color code is written only when the color differs from
 * the previous cell, and a reset is written when a blank cell follows a
 * colored run. Blank cells are interior points and palette glyphs that are
 * themselves spaces.
 */
export function composeStandard(grid: IterationGrid, display: DisplayConfig): string {
  const { width, height, maxIter, data } = grid;
  let output = "";

  for (let row = 0; row < height; row++) {
    let current: number | null = null;

    for (let col = 0; col < width; col++) {
      const n = data[row * width + col];
      const glyph = iterationToGlyph(n, maxIter, display.palette, display.mappingMode);

      if (display.color) {
        const color = iterationToColor(n, maxIter, display.ramp, display.mappingMode);
        if (color === BACKGROUND || glyph === FILL_GLYPH) {
          if (current !== null) {
            output += RESET;
            current = null;
          }
        } else if (color !== current) {
          output += foreground(color);
          current = color;
        }
      }

      output += glyph;
    }

    output += ROW_END;
  }

  return output;
}

/**
 * Color of one half-block sample: the ramp color, or a gray level when color
 * is off. Interior samples have none.
 */
function sampleColor(n: number, maxIter: number, display: DisplayConfig, color: boolean): number {
  if (n >= maxIter) return BACKGROUND;
  return color ? iterationToColor(n, maxIter, display.ramp, display.mappingMode) : grayscaleColor(n);
}

/**
 * Escape sequence and glyph for one half-block cell.
 *
 * `solidWhenEqual` draws a full block in the shared color when both samples
 * are exterior and look the same.
 */
export function halfBlockCell(top: number, bottom: number, solidWhenEqual = false): string {
  if (top === BACKGROUND && bottom === BACKGROUND) {
    return `${RESET} `;
  }
  if (top === BACKGROUND) {
    return `\x1b[38;5;${bottom};49m${LOWER_HALF}`;
  }
  if (bottom === BACKGROUND) {
    return `\x1b[38;5;${top};49m${UPPER_HALF}`;
  }
  if (solidWhenEqual && top === bottom) {
    return `\x1b[38;5;${top};49m${FULL_BLOCK}`;
  }
  return `\x1b[38;5;${top};48;5;${bottom}m${UPPER_HALF}`;
}

/**
 * Visits grid rows two at a time. An odd final row is paired with itself.
 */
export function forEachRowPair(
  height: number,
  visit: (topRow: number, bottomRow: number) => void
): void {
  for (let top = 0; top < height; top += 2) {
    visit(top, top + 1 < height ? top + 1 : top);
  }
}

export interface HalfBlockOptions {
  /** Use ramp colors even when the display has color switched off */
  forceColor?: boolean;
  solidWhenEqual?: boolean;
}

/**
 * Two grid rows per output line: the upper half block takes the top sample's
 * color as foreground, the bottom sample's color fills the background.
 */
export function composeHalfBlock(
  grid: IterationGrid,
  display: DisplayConfig,
  options: HalfBlockOptions = {}
): string {
  const { width, height, maxIter, data } = grid;
  const color = options.forceColor === true || display.color;
  let output = "";

  forEachRowPair(height, (topRow, bottomRow) => {
    for (let col = 0; col < width; col++) {
      const top = sampleColor(data[topRow * width + col], maxIter, display, color);
      const bottom = sampleColor(data[bottomRow * width + col], maxIter, display, color);
      output += halfBlockCell(top, bottom, options.solidWhenEqual);
    }
    output += ROW_END;
  });

  return output;
}

/** Frame body for the active strategy. */
export function composeFrame(grid: IterationGrid, display: DisplayConfig): string {
  return display.halfBlock ? composeHalfBlock(grid, display) : composeStandard(grid, display);
}
