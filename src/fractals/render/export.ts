import { iterationToGlyph } from "../algorithms/coloring.js";
import type { IterationGrid } from "../types.js";
import { composeHalfBlock, composeStandard, type DisplayConfig, forEachRowPair } from "./compositor.js";

export type ExportFormat = "plain" | "colored";

const EXTENSIONS: Record<ExportFormat, string> = { plain: "txt", colored: "ansi" };

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * `termbrot_YYYYMMDD_HHMMSS.txt` (or `.ansi`) in local time.
 */
export function exportFileName(format: ExportFormat, date: Date, prefix = "termbrot"): string {
  const day = `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${prefix}_${day}_${time}.${EXTENSIONS[format]}`;
}

/**
 * Glyphs only. In half-block mode each pair of rows becomes one line, using
 * the glyph of the two counts' average.
 */
export function exportPlain(grid: IterationGrid, display: DisplayConfig, header: string): string {
  const { width, height, maxIter, data } = grid;
  const glyph = (n: number) => iterationToGlyph(n, maxIter, display.palette, display.mappingMode);
  const lines: string[] = [];

  if (display.halfBlock) {
    forEachRowPair(height, (topRow, bottomRow) => {
      let line = "";
      for (let col = 0; col < width; col++) {
        line += glyph(Math.trunc((data[topRow * width + col] + data[bottomRow * width + col]) / 2));
      }
      lines.push(line);
    });
  } else {
    for (let row = 0; row < height; row++) {
      let line = "";
      for (let col = 0; col < width; col++) {
        line += glyph(data[row * width + col]);
      }
      lines.push(line);
    }
  }

  return `# ${header}\n${lines.map((line) => `${line}\n`).join("")}`;
}

/**
 * The frame as the terminal would show it with color on. Half-block cells
 * whose two samples share a color are written as a full block.
 */
export function exportColored(grid: IterationGrid, display: DisplayConfig, header: string): string {
  const body = display.halfBlock
    ? composeHalfBlock(grid, display, { forceColor: true, solidWhenEqual: true })
    : composeStandard(grid, { ...display, color: true });
  return `# ${header}\n${body}`;
}

export function exportBody(format: ExportFormat, grid: IterationGrid, display: DisplayConfig, header: string): string {
  return format === "plain" ? exportPlain(grid, display, header) : exportColored(grid, display, header);
}
