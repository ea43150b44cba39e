import { Console } from "node:console";
import { createWriteStream } from "node:fs";

/**
 * The console methods the renderer and session log through.
 * `console` itself satisfies it.
 */
export type Logger = Pick<Console, "log" | "warn" | "error">;

const discard = () => undefined;

/** Used while the terminal shows a frame: anything printed would tear it. */
export const silentLogger: Logger = { log: discard, warn: discard, error: discard };

export function createStreamLogger(stream: NodeJS.WritableStream): Logger {
  return new Console({ stdout: stream, stderr: stream });
}

/**
 * Appends log lines to a file. Call `close` before exiting so buffered lines are flushed.
 */
export function createFileLogger(path: string): { logger: Logger; close: () => Promise<void> } {
  const stream = createWriteStream(path, { flags: "a" });
  return {
    logger: createStreamLogger(stream),
    close: () =>
      new Promise<void>((resolve, reject) => {
        stream.once("error", reject);
        stream.end(() => resolve());
      }),
  };
}
