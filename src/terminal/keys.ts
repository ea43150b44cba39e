import { ITERATION_STEP } from "../config.js";
import type { ExportFormat } from "../fractals/render/export.js";
import type { NavigationCommand } from "../state/navigation.js";

/** Shape of the key object `readline` passes with each `keypress` event. */
export type Keypress = {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

export type SessionCommand = NavigationCommand | { type: "export"; format: ExportFormat } | { type: "quit" };

const previousPalette: SessionCommand = { type: "cyclePalette", step: -1 };
const nextPalette: SessionCommand = { type: "cyclePalette", step: 1 };
const moreIterations: SessionCommand = { type: "iterations", delta: ITERATION_STEP };
const fewerIterations: SessionCommand = { type: "iterations", delta: -ITERATION_STEP };

// Keypad keys in application mode, which readline does not name.
const SEQUENCES: Record<string, SessionCommand> = {
  "\x1bOM": { type: "zoomOut" },
  "\x1bOP": previousPalette,
  "\x1bOQ": nextPalette,
  "\x1bOR": fewerIterations,
  "\x1bOS": moreIterations,
  "\x1bOo": previousPalette,
  "\x1bOj": nextPalette,
  "\x1bOk": moreIterations,
  "\x1bOm": fewerIterations,
};

const NAMED_KEYS: Record<string, SessionCommand> = {
  up: { type: "pan", direction: "N" },
  down: { type: "pan", direction: "S" },
  left: { type: "pan", direction: "W" },
  right: { type: "pan", direction: "E" },
  home: { type: "pan", direction: "NW" },
  pageup: { type: "pan", direction: "NE" },
  end: { type: "pan", direction: "SW" },
  pagedown: { type: "pan", direction: "SE" },
  insert: { type: "zoomIn" },
  return: { type: "zoomOut" },
  enter: { type: "zoomOut" },
  escape: { type: "resetView" },
};

const SHIFTED_KEYS: Record<string, SessionCommand> = {
  up: { type: "stretchAxis", axis: "y", direction: "in" },
  down: { type: "stretchAxis", axis: "y", direction: "out" },
  left: { type: "stretchAxis", axis: "x", direction: "in" },
  right: { type: "stretchAxis", axis: "x", direction: "out" },
};

const CHARACTERS: Record<string, SessionCommand> = {
  "+": moreIterations,
  "-": fewerIterations,
  "/": previousPalette,
  "*": nextPalette,
  "1": { type: "cycleColorScheme", step: -1 },
  "2": { type: "cycleColorScheme", step: 1 },
  c: { type: "toggleColor" },
  C: { type: "toggleColor" },
  m: { type: "toggleMappingMode" },
  M: { type: "toggleMappingMode" },
  j: { type: "toggleJulia" },
  J: { type: "toggleJulia" },
  h: { type: "toggleHalfBlock" },
  H: { type: "toggleHalfBlock" },
  p: { type: "export", format: "plain" },
  P: { type: "export", format: "colored" },
  q: { type: "quit" },
  Q: { type: "quit" },
};

const lookup = (table: Record<string, SessionCommand>, key: string | undefined) =>
  key !== undefined && Object.hasOwn(table, key) ? table[key] : null;

/**
 * Translates one `keypress` event into a session command, or null for keys
 * without a binding.
 */
export function keyToCommand(input: string | undefined, key: Keypress = {}): SessionCommand | null {
  if (key.ctrl && key.name === "c") {
    return { type: "quit" };
  }
  if (key.ctrl || key.meta) {
    return null;
  }

  const bySequence = lookup(SEQUENCES, key.sequence);
  if (bySequence) return bySequence;

  if (key.shift) {
    const shifted = lookup(SHIFTED_KEYS, key.name);
    if (shifted) return shifted;
  }

  return lookup(NAMED_KEYS, key.name) ?? lookup(CHARACTERS, input);
}
