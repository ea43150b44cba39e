// ABOUTME: Interactive terminal session: applies commands, recomputes or redraws, exports frames
// ABOUTME: Session state lives in a zustand vanilla store; commands run strictly one after another

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createStore } from "zustand/vanilla";

import { composeFrame } from "../fractals/render/compositor.js";
import { exportBody, type ExportFormat, exportFileName } from "../fractals/render/export.js";
import type { IterationGrid, ViewportState } from "../fractals/types.js";
import { formatHeader } from "../lib/command-line.js";
import { snapToGrid } from "../lib/coordinates.js";
import { ComputeRoundError, GridAllocationError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { type AppState, displayConfig, gridSize } from "../state/app-state.js";
import { applyCommand } from "../state/navigation.js";
import type { SessionCommand } from "./keys.js";
import { CLEAR_SCREEN, type TerminalSize, terminalArea } from "./screen.js";

/** Anything that turns a viewport into a grid; `ParallelRenderer` in the program. */
export interface GridRenderer {
  compute(viewport: ViewportState, width: number, height: number): Promise<IterationGrid>;
}

export interface FrameSink {
  write(chunk: string): unknown;
}

type SessionState = {
  app: AppState;
  /** Grid on screen; null until the first round succeeds */
  grid: IterationGrid | null;
  /** Replaces the header line until the next command */
  status: string | null;
};

type SessionActions = {
  setApp: (app: AppState) => void;
  setFrame: (app: AppState, grid: IterationGrid) => void;
  setStatus: (status: string | null) => void;
};

export type SessionStore = ReturnType<typeof createSessionStore>;

export const createSessionStore = (app: AppState) =>
  createStore<SessionState & SessionActions>()((set) => ({
    app,
    grid: null,
    status: null,

    setApp: (app) => set({ app }),
    setFrame: (app, grid) => set({ app, grid }),
    setStatus: (status) => set({ status }),
  }));

export interface TerminalSessionOptions {
  renderer: GridRenderer;
  output: FrameSink;
  state: AppState;
  /** Current terminal size, read before every computation */
  size: () => TerminalSize;
  logger?: Logger;
  /** Where exports are written; the working directory by default */
  exportDirectory?: string;
  writeFile?: (path: string, data: string) => Promise<void>;
  now?: () => Date;
  onQuit?: () => void;
}

/**
 * Snaps the viewport to the grid's sampling lattice and computes it.
 * The returned state carries the snapped bounds.
 */
export async function computeSnapped(
  renderer: GridRenderer,
  app: AppState,
  width: number,
  height: number
): Promise<{ app: AppState; grid: IterationGrid }> {
  const viewport = { ...app.viewport, bounds: snapToGrid(app.viewport.bounds, width, height) };
  const grid = await renderer.compute(viewport, width, height);
  return { app: { ...app, viewport }, grid };
}

/**
 * One frame body for batch output: no header, no screen control.
 */
export async function renderBatch(renderer: GridRenderer, app: AppState, columns: number, rows: number): Promise<string> {
  const { width, height } = gridSize(app.viewport, columns, rows);
  const { app: snapped, grid } = await computeSnapped(renderer, app, width, height);
  return composeFrame(grid, displayConfig(snapped));
}

/**
 * Drives the interactive viewer. Feed it commands with {@link dispatch}; each
 * command waits for the previous one, including any compute round it started.
 */
export class TerminalSession {
  readonly store: SessionStore;
  private readonly renderer: GridRenderer;
  private readonly output: FrameSink;
  private readonly size: () => TerminalSize;
  private readonly logger: Logger;
  private readonly exportDirectory: string;
  private readonly writeFile: (path: string, data: string) => Promise<void>;
  private readonly now: () => Date;
  private readonly onQuit: () => void;
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(options: TerminalSessionOptions) {
    this.store = createSessionStore(options.state);
    this.renderer = options.renderer;
    this.output = options.output;
    this.size = options.size;
    this.logger = options.logger ?? console;
    this.exportDirectory = options.exportDirectory ?? process.cwd();
    this.writeFile = options.writeFile ?? ((path, data) => writeFile(path, data, "utf8"));
    this.now = options.now ?? (() => new Date());
    this.onQuit = options.onQuit ?? (() => undefined);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Computes and draws the first frame. */
  start(): Promise<void> {
    return this.enqueue(() => this.update(this.store.getState().app, true));
  }

  /** Redraws after a terminal resize, recomputing if the grid no longer fits. */
  refresh(): Promise<void> {
    return this.enqueue(() => this.update(this.store.getState().app, false));
  }

  dispatch(command: SessionCommand): Promise<void> {
    return this.enqueue(() => this.handle(command));
  }

  private enqueue(step: () => Promise<void>): Promise<void> {
    const run = this.queue.then(() => (this.closed ? undefined : step()));
    this.queue = run.catch((error: unknown) => {
      this.logger.error("Session command failed:", error);
    });
    return run;
  }

  private async handle(command: SessionCommand): Promise<void> {
    const { app, setStatus } = this.store.getState();
    setStatus(null);

    switch (command.type) {
      case "quit":
        this.closed = true;
        this.onQuit();
        return;
      case "export":
        await this.exportFrame(command.format);
        this.draw();
        return;
      default: {
        const { state, recompute } = applyCommand(app, command);
        await this.update(state, recompute);
      }
    }
  }

  /**
   * Commits a new state. The grid is recomputed when the command asks for it
   * or when the grid size no longer matches the terminal (resize, half-block).
   */
  private async update(app: AppState, recompute: boolean): Promise<void> {
    const area = terminalArea(this.size());
    const { width, height } = gridSize(app.viewport, area.columns, area.rows);
    const current = this.store.getState().grid;

    if (recompute || !current || current.width !== width || current.height !== height) {
      await this.recompute(app, width, height);
    } else {
      this.store.getState().setApp(app);
    }
    this.draw();
  }

  private async recompute(app: AppState, width: number, height: number): Promise<void> {
    const { setFrame, setStatus } = this.store.getState();
    try {
      const result = await computeSnapped(this.renderer, app, width, height);
      setFrame(result.app, result.grid);
    } catch (error) {
      if (error instanceof GridAllocationError || error instanceof ComputeRoundError) {
        // The command is dropped; the previous state and grid stay on screen.
        this.logger.error(error);
        setStatus(error.message);
        return;
      }
      throw error;
    }
  }

  private async exportFrame(format: ExportFormat): Promise<void> {
    const { app, grid, setStatus } = this.store.getState();
    if (!grid) {
      setStatus("Nothing to save yet");
      return;
    }

    const fileName = exportFileName(format, this.now());
    const path = join(this.exportDirectory, fileName);
    try {
      await this.writeFile(path, exportBody(format, grid, displayConfig(app), formatHeader(app)));
      this.logger.log(`Saved ${format} export to ${path}`);
      setStatus(`Saved: ${fileName}`);
    } catch (error) {
      this.logger.error(`Failed to save ${path}:`, error);
      setStatus(`Save failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /** The full screen contents for the current state. */
  frame(): string {
    const { app, grid, status } = this.store.getState();
    const header = `${CLEAR_SCREEN}${status ?? formatHeader(app)}\n`;
    return grid ? header + composeFrame(grid, displayConfig(app)) : header;
  }

  private draw(): void {
    this.output.write(this.frame());
  }
}
