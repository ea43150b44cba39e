#!/usr/bin/env node
// ABOUTME: Program entry point: parses options, starts the worker pool, runs batch or interactive mode
// ABOUTME: Restores the terminal on quit, on SIGINT/SIGTERM and when a command fails

import { PROGRAM_NAME } from "./config.js";
import { ParallelRenderer } from "./fractals/render/parallel-renderer.js";
import { type CliOptions, helpText, parseArguments } from "./lib/command-line.js";
import { ConfigError } from "./lib/errors.js";
import { createFileLogger, createStreamLogger, type Logger, silentLogger } from "./lib/logger.js";
import { type AppState, createAppState } from "./state/app-state.js";
import { type Keypress, keyToCommand } from "./terminal/keys.js";
import { enterInteractiveMode, leaveInteractiveMode, type TerminalArea, terminalArea } from "./terminal/screen.js";
import { type GridRenderer, renderBatch, TerminalSession } from "./terminal/session.js";

function batchArea(options: CliOptions): TerminalArea {
  if (options.size) {
    return { columns: options.size.width, rows: options.size.height };
  }
  return terminalArea({ columns: process.stdout.columns, rows: process.stdout.rows });
}

function runInteractive(renderer: GridRenderer, state: AppState, logger: Logger): Promise<void> {
  const { stdin, stdout } = process;

  return new Promise<void>((resolve, reject) => {
    let finished = false;

    const finish = (failure: { error: unknown } | null) => {
      if (finished) return;
      finished = true;
      stdin.off("keypress", onKeypress);
      stdout.off("resize", onResize);
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      leaveInteractiveMode(stdin, stdout);
      if (failure) {
        reject(failure.error);
      } else {
        resolve();
      }
    };
    const fail = (error: unknown) => finish({ error });

    const session = new TerminalSession({
      renderer,
      output: stdout,
      state,
      size: () => ({ columns: stdout.columns, rows: stdout.rows }),
      logger,
      onQuit: () => finish(null),
    });

    const onKeypress = (input: string | undefined, key: Keypress | undefined) => {
      const command = keyToCommand(input, key);
      if (command) {
        session.dispatch(command).catch(fail);
      }
    };
    const onResize = () => {
      session.refresh().catch(fail);
    };
    const onSignal = (signal: NodeJS.Signals) => {
      logger.log(`Received ${signal}, exiting`);
      finish(null);
    };

    enterInteractiveMode(stdin, stdout);
    stdin.on("keypress", onKeypress);
    stdout.on("resize", onResize);
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    session.start().catch(fail);
  });
}

async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  let state: AppState;
  try {
    options = parseArguments(argv);
    state = createAppState(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.error(`Run '${PROGRAM_NAME} --help' for usage.`);
      return 1;
    }
    throw error;
  }

  if (options.help) {
    process.stdout.write(helpText());
    return 0;
  }

  const fileLog = options.logFile ? createFileLogger(options.logFile) : null;
  // Anything written to the terminal in interactive mode would tear the frame.
  const logger = fileLog?.logger ?? (options.batch ? createStreamLogger(process.stderr) : silentLogger);
  const renderer = new ParallelRenderer({ workerCount: options.workers, logger });

  try {
    await renderer.init();
    if (options.batch) {
      const area = batchArea(options);
      process.stdout.write(await renderBatch(renderer, state, area.columns, area.rows));
    } else {
      await runInteractive(renderer, state, logger);
    }
    return 0;
  } finally {
    await renderer.terminate();
    await fileLog?.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
