// ABOUTME: Command-line parsing and the reconstruction string for the current view
// ABOUTME: Parsing the reconstruction tokens reproduces the state they were built from

import { Decimal } from "decimal.js";

import { DEFAULT_BOUNDS, MAX_ITERATIONS, MAX_WORKERS, MIN_ITERATIONS, PROGRAM_NAME } from "../config.js";
import type { Bounds, Complex, MappingMode } from "../fractals/types.js";
import { type AppState, type AppStateOptions, currentPalette } from "../state/app-state.js";
import { ConfigError } from "./errors.js";
import { createPalette, loadBuiltinPalettes, loadColorSchemes } from "./lookup-tables.js";

const SIGNIFICANT_DIGITS = 9;

export type CliOptions = AppStateOptions & {
  /** Worker threads, 0 for one per logical core */
  workers: number;
  batch: boolean;
  /** Batch output size in text cells; the terminal size when null */
  size: { width: number; height: number } | null;
  logFile: string | null;
  help: boolean;
};

/** Plane coordinates as written on the command line: nine significant digits. */
export function formatCoordinate(value: number): string {
  return new Decimal(value).toSignificantDigits(SIGNIFICANT_DIGITS).toString();
}

/** Wraps a value in single quotes for a POSIX shell. */
export function shellQuote(value: string): string {
  return `'${value.replaceAll("'", "'\\''")}'`;
}

/**
 * Arguments that recreate the current view, program name first.
 */
export function commandLineTokens(state: AppState): string[] {
  const { viewport, display } = state;
  const { bounds } = viewport;
  const tokens = [
    PROGRAM_NAME,
    "-x",
    formatCoordinate(bounds.xmin),
    formatCoordinate(bounds.xmax),
    "-y",
    formatCoordinate(bounds.ymin),
    formatCoordinate(bounds.ymax),
    "-i",
    String(viewport.maxIter),
  ];

  if (!display.useColor) tokens.push("-nc");
  if (viewport.mappingMode === "linear") tokens.push("-m", "lin");
  if (viewport.halfBlock) tokens.push("-hb");
  if (viewport.mode === "julia") {
    tokens.push("-j", formatCoordinate(viewport.juliaConstant.re), formatCoordinate(viewport.juliaConstant.im));
  }
  tokens.push("-col", String(display.colorSchemeIndex + 1));

  const palette = currentPalette(state);
  if (palette.custom) {
    tokens.push("--symbols", palette.symbols);
  } else {
    tokens.push("-pal", String(display.paletteIndex + 1));
  }

  return tokens;
}

/**
 * The reconstruction string, ready to paste into a shell.
 *
 * @example
 * buildCommandLine(createAppState());
 * // "termbrot -x -2 1 -y -1 1 -i 30 -col 1 -pal 2"
 */
export function buildCommandLine(state: AppState): string {
  const tokens = commandLineTokens(state);
  return tokens.map((token, i) => (tokens[i - 1] === "--symbols" ? shellQuote(token) : token)).join(" ");
}

/**
 * Header line for the frame and export files. Built-in palettes are shown
 * after a `|` for reference; that part is not meant to be pasted.
 */
export function formatHeader(state: AppState): string {
  const palette = currentPalette(state);
  const commandLine = buildCommandLine(state);
  return palette.custom ? commandLine : `${commandLine} | "${palette.symbols}"`;
}

function parseNumber(option: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new ConfigError(`${option}: '${value}' is not a number`);
  }
  return parsed;
}

function parseInteger(option: string, value: string, min: number, max: number, label: string): number {
  const parsed = parseNumber(option, value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(`${label} must be ${min}-${max}`);
  }
  return parsed;
}

function parseRange(option: string, low: string, high: string, axis: string): [number, number] {
  const min = parseNumber(option, low);
  const max = parseNumber(option, high);
  if (min >= max) {
    throw new ConfigError(`${axis}min must be less than ${axis}max`);
  }
  return [min, max];
}

function parseMappingMode(value: string): MappingMode {
  if (value === "mod" || value === "modulo") return "modulo";
  if (value === "lin" || value === "linear") return "linear";
  throw new ConfigError("mode must be 'mod' or 'lin'");
}

function parseSize(value: string): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(value);
  if (!match) {
    throw new ConfigError(`--size: expected WIDTHxHEIGHT, got '${value}'`);
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width < 1 || height < 1) {
    throw new ConfigError("--size: width and height must be at least 1");
  }
  return { width, height };
}

/**
 * Parses program arguments (without the program name).
 *
 * @throws ConfigError on unknown options, missing or malformed values and
 * values out of range
 */
export function parseArguments(argv: readonly string[]): CliOptions {
  const paletteCount = loadBuiltinPalettes().length;
  const colorSchemeCount = loadColorSchemes().length;
  const options: CliOptions = { workers: 0, batch: false, size: null, logFile: null, help: false };
  let bounds: Bounds = { ...DEFAULT_BOUNDS };
  let juliaConstant: Complex | null = null;

  let i = 0;
  const take = (option: string, count: number): string[] => {
    if (argv.length - i < count) {
      throw new ConfigError(`${option} requires ${count === 1 ? "a value" : `${count} values`}`);
    }
    const values = argv.slice(i, i + count);
    i += count;
    return values;
  };

  while (i < argv.length) {
    const option = argv[i++];
    switch (option) {
      case "-t": {
        const [value] = take(option, 1);
        options.workers = parseInteger(option, value, 0, MAX_WORKERS, "threads");
        break;
      }
      case "-nc":
        options.color = false;
        break;
      case "-hb":
        options.halfBlock = true;
        break;
      case "-b":
      case "--batch":
        options.batch = true;
        break;
      case "-x": {
        const [low, high] = take(option, 2);
        const [xmin, xmax] = parseRange(option, low, high, "x");
        bounds = { ...bounds, xmin, xmax };
        break;
      }
      case "-y": {
        const [low, high] = take(option, 2);
        const [ymin, ymax] = parseRange(option, low, high, "y");
        bounds = { ...bounds, ymin, ymax };
        break;
      }
      case "-i": {
        const [value] = take(option, 1);
        options.maxIter = parseInteger(option, value, MIN_ITERATIONS, MAX_ITERATIONS, "iterations");
        break;
      }
      case "-pal": {
        const [value] = take(option, 1);
        options.paletteIndex = parseInteger(option, value, 1, paletteCount, "palette") - 1;
        break;
      }
      case "-col": {
        const [value] = take(option, 1);
        options.colorSchemeIndex = parseInteger(option, value, 1, colorSchemeCount, "color") - 1;
        break;
      }
      case "-m":
      case "--mode": {
        const [value] = take(option, 1);
        options.mappingMode = parseMappingMode(value);
        break;
      }
      case "-j": {
        const [re, im] = take(option, 2);
        juliaConstant = { re: parseNumber(option, re), im: parseNumber(option, im) };
        break;
      }
      case "--symbols": {
        const [value] = take(option, 1);
        options.symbols = createPalette(value, true).symbols;
        break;
      }
      case "--size": {
        const [value] = take(option, 1);
        options.size = parseSize(value);
        break;
      }
      case "--log": {
        const [value] = take(option, 1);
        options.logFile = value;
        break;
      }
      case "-h":
      case "--help":
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${option}`);
    }
  }

  return { ...options, bounds, juliaConstant };
}

export function helpText(): string {
  return `Usage: ${PROGRAM_NAME} [options]

Options:
  -t N                 Worker threads (0 = one per core, max ${MAX_WORKERS})
  -nc                  Disable colors
  -x MIN MAX           Real axis bounds (default -2 1)
  -y MIN MAX           Imaginary axis bounds (default -1 1)
  -i N                 Iterations (${MIN_ITERATIONS}-${MAX_ITERATIONS}, default 30)
  -pal N               Built-in palette (1-16, default 2)
  -col N               Color scheme (1-16, default 1)
  -m, --mode MODE      Mapping mode: mod|modulo or lin|linear
  -j CR CI             Julia set with constant c = CR + CI*i
  -hb                  Half-block rendering (two samples per character)
  --symbols S          Custom palette of 2-256 characters
  -b, --batch          Render once to stdout and exit
  --size WxH           Batch output size in characters (default: terminal size)
  --log FILE           Append diagnostic logs to FILE
  -h, --help           Show this help

Controls:
  Arrows, numpad 8 2 4 6     Pan
  Home PgUp End PgDn         Pan diagonally
  Insert / Enter             Zoom in / out
  Shift+Arrows               Stretch or squash one axis
  + / -                      Iterations +5 / -5
  / *                        Previous / next palette
  1 2                        Previous / next color scheme
  c                          Toggle color
  m                          Toggle modulo/linear mapping
  j                          Toggle Julia/Mandelbrot (c taken from the view center)
  h                          Toggle half-block rendering
  Esc                        Reset view
  p                          Save to .txt (plain text)
  P                          Save to .ansi (with colors)
  q, Ctrl+C                  Quit

The header shows a command that recreates the current view.
`;
}
