import { describe, expect, it } from "vitest";

import { keyToCommand } from "./keys.js";

describe("keyToCommand", () => {
  it("should pan with the arrow keys", () => {
    expect(keyToCommand(undefined, { name: "up", sequence: "\x1b[A" })).toEqual({ type: "pan", direction: "N" });
    expect(keyToCommand(undefined, { name: "left", sequence: "\x1b[D" })).toEqual({ type: "pan", direction: "W" });
  });

  it("should pan diagonally with Home, PgUp, End and PgDn", () => {
    expect(keyToCommand(undefined, { name: "home" })).toEqual({ type: "pan", direction: "NW" });
    expect(keyToCommand(undefined, { name: "pageup" })).toEqual({ type: "pan", direction: "NE" });
    expect(keyToCommand(undefined, { name: "end" })).toEqual({ type: "pan", direction: "SW" });
    expect(keyToCommand(undefined, { name: "pagedown" })).toEqual({ type: "pan", direction: "SE" });
  });

  it("should stretch an axis with Shift+arrows", () => {
    expect(keyToCommand(undefined, { name: "up", shift: true, sequence: "\x1b[1;2A" })).toEqual({
      type: "stretchAxis",
      axis: "y",
      direction: "in",
    });
    expect(keyToCommand(undefined, { name: "right", shift: true })).toEqual({
      type: "stretchAxis",
      axis: "x",
      direction: "out",
    });
  });

  it("should zoom with Insert and Enter", () => {
    expect(keyToCommand(undefined, { name: "insert" })).toEqual({ type: "zoomIn" });
    expect(keyToCommand("\r", { name: "return", sequence: "\r" })).toEqual({ type: "zoomOut" });
    expect(keyToCommand(undefined, { sequence: "\x1bOM" })).toEqual({ type: "zoomOut" });
  });

  it("should read keypad operators in application mode", () => {
    expect(keyToCommand(undefined, { sequence: "\x1bOk" })).toEqual({ type: "iterations", delta: 5 });
    expect(keyToCommand(undefined, { sequence: "\x1bOm" })).toEqual({ type: "iterations", delta: -5 });
    expect(keyToCommand(undefined, { sequence: "\x1bOo" })).toEqual({ type: "cyclePalette", step: -1 });
    expect(keyToCommand(undefined, { sequence: "\x1bOj" })).toEqual({ type: "cyclePalette", step: 1 });
  });

  it("should map character keys", () => {
    expect(keyToCommand("+", { name: undefined, sequence: "+" })).toEqual({ type: "iterations", delta: 5 });
    expect(keyToCommand("2", { name: "2", sequence: "2" })).toEqual({ type: "cycleColorScheme", step: 1 });
    expect(keyToCommand("J", { name: "j", shift: true, sequence: "J" })).toEqual({ type: "toggleJulia" });
    expect(keyToCommand("h", { name: "h", sequence: "h" })).toEqual({ type: "toggleHalfBlock" });
  });

  it("should tell plain and colored export apart", () => {
    expect(keyToCommand("p", { name: "p", sequence: "p" })).toEqual({ type: "export", format: "plain" });
    expect(keyToCommand("P", { name: "p", shift: true, sequence: "P" })).toEqual({
      type: "export",
      format: "colored",
    });
  });

  it("should reset on Escape and quit on q or Ctrl+C", () => {
    expect(keyToCommand(undefined, { name: "escape", sequence: "\x1b" })).toEqual({ type: "resetView" });
    expect(keyToCommand("q", { name: "q", sequence: "q" })).toEqual({ type: "quit" });
    expect(keyToCommand(undefined, { name: "c", ctrl: true, sequence: "\x03" })).toEqual({ type: "quit" });
  });

  it("should ignore unbound keys and modifier chords", () => {
    expect(keyToCommand("x", { name: "x", sequence: "x" })).toBeNull();
    expect(keyToCommand(undefined, { name: "delete", sequence: "\x1b[3~" })).toBeNull();
    expect(keyToCommand("m", { name: "m", meta: true })).toBeNull();
  });
});
