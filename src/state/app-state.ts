import {
  DEFAULT_BOUNDS,
  DEFAULT_COLOR_SCHEME_INDEX,
  DEFAULT_ITERATIONS,
  DEFAULT_JULIA_CONSTANT,
  DEFAULT_PALETTE_INDEX,
} from "../config.js";
import type { DisplayConfig } from "../fractals/render/compositor.js";
import type { Bounds, ColorRamp, Complex, MappingMode, Palette, ViewportState } from "../fractals/types.js";
import { createPalette, loadBuiltinPalettes, loadColorSchemes } from "../lib/lookup-tables.js";

export type DisplayState = {
  /** Index into `AppState.palettes`; the custom palette, if any, is last */
  paletteIndex: number;
  colorSchemeIndex: number;
  useColor: boolean;
};

/**
 * The whole application state. Navigation takes one and returns a new one;
 * nothing mutates it in place.
 */
export type AppState = {
  viewport: ViewportState;
  display: DisplayState;
  palettes: readonly Palette[];
  colorSchemes: readonly ColorRamp[];
};

export type AppStateOptions = {
  bounds?: Bounds;
  maxIter?: number;
  /** Starts in Julia mode with this constant when set */
  juliaConstant?: Complex | null;
  mappingMode?: MappingMode;
  halfBlock?: boolean;
  color?: boolean;
  /** 0-based built-in palette; ignored when `symbols` is set */
  paletteIndex?: number;
  colorSchemeIndex?: number;
  /** Custom palette, appended after the built-ins and selected */
  symbols?: string | null;
  palettes?: readonly Palette[];
  colorSchemes?: readonly ColorRamp[];
};

export function createAppState(options: AppStateOptions = {}): AppState {
  const builtins = options.palettes ?? loadBuiltinPalettes();
  const palettes = options.symbols ? [...builtins, createPalette(options.symbols, true)] : builtins;
  const julia = options.juliaConstant ?? null;

  return {
    viewport: {
      bounds: { ...(options.bounds ?? DEFAULT_BOUNDS) },
      maxIter: options.maxIter ?? DEFAULT_ITERATIONS,
      mode: julia ? "julia" : "mandelbrot",
      juliaConstant: { ...(julia ?? DEFAULT_JULIA_CONSTANT) },
      mappingMode: options.mappingMode ?? "modulo",
      halfBlock: options.halfBlock ?? false,
    },
    display: {
      paletteIndex: options.symbols ? palettes.length - 1 : options.paletteIndex ?? DEFAULT_PALETTE_INDEX,
      colorSchemeIndex: options.colorSchemeIndex ?? DEFAULT_COLOR_SCHEME_INDEX,
      useColor: options.color ?? true,
    },
    palettes,
    colorSchemes: options.colorSchemes ?? loadColorSchemes(),
  };
}

export const currentPalette = (state: AppState): Palette => state.palettes[state.display.paletteIndex];

export const currentRamp = (state: AppState): ColorRamp => state.colorSchemes[state.display.colorSchemeIndex];

export function displayConfig(state: AppState): DisplayConfig {
  return {
    palette: currentPalette(state),
    ramp: currentRamp(state),
    color: state.display.useColor,
    mappingMode: state.viewport.mappingMode,
    halfBlock: state.viewport.halfBlock,
  };
}

/**
 * Grid resolution for a terminal area: half-block mode samples two grid rows
 * per text row.
 */
export function gridSize(viewport: ViewportState, columns: number, rows: number): { width: number; height: number } {
  return { width: columns, height: viewport.halfBlock ? rows * 2 : rows };
}
