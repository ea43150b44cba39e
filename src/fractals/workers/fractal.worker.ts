// ABOUTME: Worker thread entry for parallel fractal computation using Comlink RPC
// ABOUTME: Exposes computeRows over parentPort for the main thread to call

import * as Comlink from "comlink";
import { parentPort } from "node:worker_threads";

import { computeRows } from "./compute-rows.js";
import { portEndpoint } from "./port-endpoint.js";
import type { RowTask } from "./types.js";

/**
 * Worker API exposed to the main thread via Comlink.
 * All methods can be called as if they were async functions on the main thread.
 */
const workerAPI = {
  /**
   * Fills the task's rows of the shared grid.
   */
  computeRows: (task: RowTask) => computeRows(task),

  /**
   * Simple ping method for testing worker connectivity.
   */
  ping: () => "pong" as const,
};

if (parentPort) {
  Comlink.expose(workerAPI, portEndpoint(parentPort));
}

export type FractalWorkerAPI = typeof workerAPI;
