// ABOUTME: Loads the built-in glyph palettes and color ramps from data/
// ABOUTME: Validates the JSON once; everything downstream treats the tables as immutable

import { readFileSync } from "node:fs";

import { MAX_PALETTE_LENGTH, MIN_PALETTE_LENGTH } from "../config.js";
import type { ColorRamp, Palette } from "../fractals/types.js";
import { ConfigError } from "./errors.js";

const RAMP_LENGTH = 16;

// Resolves to <package>/data from both src/lib and dist/lib.
const DATA_DIR = new URL("../../data/", import.meta.url);

function readJson(name: string): unknown {
  return JSON.parse(readFileSync(new URL(name, DATA_DIR), "utf8"));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Builds a palette from the characters the user typed. Glyphs are code points,
 * so `"░▒▓█"` has four entries.
 *
 * @throws ConfigError when the glyph count is outside [2, 256]
 */
export function createPalette(symbols: string, custom: boolean): Palette {
  const glyphs = Object.freeze(Array.from(symbols));
  if (glyphs.length < MIN_PALETTE_LENGTH || glyphs.length > MAX_PALETTE_LENGTH) {
    throw new ConfigError(
      `palette must have ${MIN_PALETTE_LENGTH}-${MAX_PALETTE_LENGTH} characters, got ${glyphs.length}`
    );
  }
  return Object.freeze({ symbols, glyphs, custom });
}

export function parsePalettes(json: unknown): readonly Palette[] {
  if (!isRecord(json) || !Array.isArray(json.palettes)) {
    throw new ConfigError("palettes.json: expected an object with a 'palettes' array");
  }
  const palettes = json.palettes.map((entry: unknown, index: number) => {
    if (typeof entry !== "string") {
      throw new ConfigError(`palettes.json: entry ${index} is not a string`);
    }
    return createPalette(entry, false);
  });
  if (palettes.length === 0) {
    throw new ConfigError("palettes.json: no palettes defined");
  }
  return Object.freeze(palettes);
}

export function parseColorSchemes(json: unknown): readonly ColorRamp[] {
  if (!isRecord(json) || !Array.isArray(json.colorSchemes)) {
    throw new ConfigError("color-schemes.json: expected an object with a 'colorSchemes' array");
  }
  const ramps = json.colorSchemes.map((entry: unknown, index: number) => {
    if (
      !Array.isArray(entry) ||
      entry.length !== RAMP_LENGTH ||
      !entry.every((color: unknown) => Number.isInteger(color) && Number(color) >= 0 && Number(color) <= 255)
    ) {
      throw new ConfigError(
        `color-schemes.json: scheme ${index} must list ${RAMP_LENGTH} color indices in 0-255`
      );
    }
    return Object.freeze(entry.map(Number));
  });
  if (ramps.length === 0) {
    throw new ConfigError("color-schemes.json: no color schemes defined");
  }
  return Object.freeze(ramps);
}

let builtinPalettes: readonly Palette[] | null = null;
let builtinColorSchemes: readonly ColorRamp[] | null = null;

/** Built-in palettes, read from disk on first use. */
export function loadBuiltinPalettes(): readonly Palette[] {
  builtinPalettes ??= parsePalettes(readJson("palettes.json"));
  return builtinPalettes;
}

/** Built-in color ramps, read from disk on first use. */
export function loadColorSchemes(): readonly ColorRamp[] {
  builtinColorSchemes ??= parseColorSchemes(readJson("color-schemes.json"));
  return builtinColorSchemes;
}
