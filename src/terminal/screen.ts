import { emitKeypressEvents } from "node:readline";

import { HEADER_ROWS, MAX_TERMINAL_HEIGHT, MAX_TERMINAL_WIDTH, MIN_TERMINAL_SIZE } from "../config.js";
import { RESET } from "../fractals/render/compositor.js";

export const CLEAR_SCREEN = "\x1b[2J\x1b[H";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";

const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;

export type TerminalSize = {
  columns?: number;
  rows?: number;
};

/** Text cells available for the fractal. */
export type TerminalArea = {
  columns: number;
  rows: number;
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

/**
 * Cells left for the fractal once the header line and the cursor row are
 * taken, clamped to sane limits. Unknown sizes (not a TTY) fall back to 80x24.
 */
export function terminalArea(size: TerminalSize): TerminalArea {
  return {
    columns: clamp(size.columns ?? FALLBACK_COLUMNS, MIN_TERMINAL_SIZE, MAX_TERMINAL_WIDTH),
    rows: clamp((size.rows ?? FALLBACK_ROWS) - HEADER_ROWS, MIN_TERMINAL_SIZE, MAX_TERMINAL_HEIGHT),
  };
}

/** Raw keypress input and a hidden cursor on a cleared screen. */
export function enterInteractiveMode(input: NodeJS.ReadStream, output: NodeJS.WriteStream): void {
  emitKeypressEvents(input);
  if (input.isTTY) {
    input.setRawMode(true);
  }
  input.resume();
  output.write(HIDE_CURSOR + CLEAR_SCREEN);
}

/** Undoes {@link enterInteractiveMode}. Safe to call more than once. */
export function leaveInteractiveMode(input: NodeJS.ReadStream, output: NodeJS.WriteStream): void {
  if (input.isTTY) {
    input.setRawMode(false);
  }
  input.pause();
  output.write(RESET + CLEAR_SCREEN + SHOW_CURSOR);
}
