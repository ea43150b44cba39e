// ABOUTME: Orchestrates fork-join fractal computation across Node.js worker threads
// ABOUTME: Manages the worker pool and splits the grid into one row range per worker

import * as Comlink from "comlink";
import { Worker } from "node:worker_threads";

import { MAX_WORKERS, WORKER_START_TIMEOUT_MS } from "../../config.js";
import { ComputeRoundError, GridAllocationError } from "../../lib/errors.js";
import type { Logger } from "../../lib/logger.js";
import { PerformanceMonitor } from "../../lib/performance-monitor.js";
import type { IterationGrid, ViewportState } from "../types.js";
import { computeRows } from "../workers/compute-rows.js";
import type { FractalWorkerAPI } from "../workers/fractal.worker.js";
import { type MessageTarget, portEndpoint } from "../workers/port-endpoint.js";
import { createRowTask, type RowTask, type RowTaskResult } from "../workers/types.js";
import { partitionRows, resolveWorkerCount } from "./rows.js";

/**
 * What the pool needs from a worker thread. `node:worker_threads` `Worker` fits;
 * tests pass lightweight fakes.
 */
export interface WorkerHandle extends MessageTarget {
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "exit", listener: (exitCode: number) => void): unknown;
  off(event: "message", listener: (value: unknown) => void): unknown;
  off(event: "error", listener: (error: Error) => void): unknown;
  off(event: "exit", listener: (exitCode: number) => void): unknown;
  terminate(): Promise<number>;
}

export type WorkerFactory = () => WorkerHandle;

export interface ParallelRendererOptions {
  /** Worker threads to start; 0 or undefined uses one per logical core */
  workerCount?: number;
  /** Creates one worker thread; defaults to loading `fractal.worker` */
  workerFactory?: WorkerFactory;
  logger?: Logger;
  /** How long a new worker may take to answer its first ping */
  startTimeout?: number;
}

interface PooledWorker {
  handle: WorkerHandle;
  api: Comlink.Remote<FractalWorkerAPI>;
  /** Set once the thread has errored or exited */
  stopped: boolean;
}

interface FailureWatch {
  /** Rejects if the thread errors or exits before `dispose()` */
  failed: Promise<never>;
  dispose: () => void;
}

// Running from sources (tsx) loads the TypeScript worker, a build loads the emitted one.
const WORKER_URL = new URL(
  import.meta.url.endsWith(".ts") ? "../workers/fractal.worker.ts" : "../workers/fractal.worker.js",
  import.meta.url
);

/**
 * Node flags for a worker thread. A TypeScript worker needs the tsx loader,
 * which worker threads do not pick up from the parent on their own.
 */
export function workerExecArgv(workerUrl: URL, execArgv: readonly string[] = process.execArgv): string[] | undefined {
  if (!workerUrl.pathname.endsWith(".ts")) {
    return undefined;
  }
  return [...execArgv, "--import", "tsx"];
}

export const defaultWorkerFactory: WorkerFactory = () =>
  new Worker(WORKER_URL, { execArgv: workerExecArgv(WORKER_URL) });

function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function watchFailure(handle: WorkerHandle): FailureWatch {
  let dispose = () => {};
  const failed = new Promise<never>((_, reject) => {
    const onError = (error: Error) => reject(error);
    const onExit = (exitCode: number) => reject(new Error(`Worker exited with code ${exitCode}`));
    handle.once("error", onError);
    handle.once("exit", onExit);
    dispose = () => {
      handle.off("error", onError);
      handle.off("exit", onExit);
    };
  });
  return { failed, dispose };
}

/**
 * Allocates the grid buffer shared by every worker of a round.
 *
 * @throws GridAllocationError if the runtime cannot provide the memory
 */
export function allocateGridBuffer(width: number, height: number): SharedArrayBuffer {
  try {
    return new SharedArrayBuffer(width * height * Int32Array.BYTES_PER_ELEMENT);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new GridAllocationError(width, height, { cause: error });
    }
    throw error;
  }
}

/**
 * ParallelRenderer computes iteration grids across a pool of worker threads.
 *
 * Each round splits the grid rows into one contiguous range per worker. All
 * workers write into one `SharedArrayBuffer`, each into its own rows, so no
 * locking is involved. `compute()` resolves only after every range is done;
 * there is no partial grid. Ranges whose worker could not be started are
 * computed on the calling thread instead.
 *
 * Usage:
 * ```typescript
 * const renderer = new ParallelRenderer({ workerCount: 4 });
 * await renderer.init();
 * const grid = await renderer.compute(viewport, 80, 22);
 * await renderer.terminate();
 * ```
 */
export class ParallelRenderer {
  private workers: Array<PooledWorker | null> = [];
  private readonly workerCount: number;
  private readonly workerFactory: WorkerFactory;
  private readonly logger: Logger;
  private readonly startTimeout: number;
  private isInitialized = false;
  private performanceMonitor = new PerformanceMonitor();
  private lastRound: Promise<unknown> = Promise.resolve();

  constructor(options: ParallelRendererOptions = {}) {
    this.workerCount = resolveWorkerCount(options.workerCount, MAX_WORKERS);
    this.workerFactory = options.workerFactory ?? defaultWorkerFactory;
    this.logger = options.logger ?? console;
    this.startTimeout = options.startTimeout ?? WORKER_START_TIMEOUT_MS;
  }

  /**
   * Starts the worker pool. Must be called before compute().
   * A worker that fails to start is left out of the pool and logged.
   */
  async init(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    this.workers = await Promise.all(
      Array.from({ length: this.workerCount }, (_, index) => this.startWorker(index))
    );
    this.isInitialized = true;

    this.logger.log(
      `ParallelRenderer initialized with ${this.getStartedWorkerCount()} of ${this.workerCount} workers`
    );
  }

  private async startWorker(index: number): Promise<PooledWorker | null> {
    let handle: WorkerHandle;
    try {
      handle = this.workerFactory();
    } catch (error) {
      this.logger.warn(`Worker ${index} could not be started; its rows will be computed on the main thread:`, error);
      return null;
    }

    const api = Comlink.wrap<FractalWorkerAPI>(portEndpoint(handle));
    const startup = watchFailure(handle);

    try {
      const response = await withTimeout(
        Promise.race([api.ping(), startup.failed]),
        this.startTimeout,
        `Worker ${index} did not answer within ${this.startTimeout}ms`
      );
      if (response !== "pong") {
        throw new Error(`Worker ${index} failed to respond to ping`);
      }
    } catch (error) {
      this.logger.warn(`Worker ${index} could not be started; its rows will be computed on the main thread:`, error);
      api[Comlink.releaseProxy]();
      await handle.terminate();
      return null;
    } finally {
      startup.dispose();
    }

    const worker: PooledWorker = { handle, api, stopped: false };
    handle.once("error", (error) => this.handleWorkerFailure(index, worker, error));
    handle.once("exit", (exitCode) =>
      this.handleWorkerFailure(index, worker, new Error(`Worker exited with code ${exitCode}`))
    );
    return worker;
  }

  private handleWorkerFailure(index: number, worker: PooledWorker, error: Error): void {
    if (worker.stopped) {
      return;
    }
    worker.stopped = true;
    // After terminate() the worker is no longer pooled and its exit is expected.
    if (this.workers[index] !== worker) {
      return;
    }
    this.logger.warn(`Worker ${index} stopped; its rows will be computed on the main thread:`, error);
    this.workers[index] = null;
  }

  /**
   * Computes the iteration grid for a viewport in one fork-join round.
   *
   * Rounds never overlap: a call made while another round is running starts
   * after that round has settled.
   *
   * @param viewport - Bounds (already snapped), iteration cap and fractal mode
   * @param width - Grid columns
   * @param height - Grid rows
   * @throws GridAllocationError if the grid buffer cannot be allocated
   * @throws ComputeRoundError if a worker fails while the round is running
   */
  compute(viewport: ViewportState, width: number, height: number): Promise<IterationGrid> {
    const run = () => this.runRound(viewport, width, height);
    const round = this.lastRound.then(run, run);
    this.lastRound = round;
    return round;
  }

  private async runRound(viewport: ViewportState, width: number, height: number): Promise<IterationGrid> {
    if (!this.isInitialized) {
      throw new Error("ParallelRenderer not initialized. Call init() first.");
    }

    const buffer = allocateGridBuffer(width, height);
    const ranges = partitionRows(height, resolveWorkerCount(this.workerCount, height));
    const roundId = this.performanceMonitor.startRound(ranges.length, width * height);

    const dispatched: Array<Promise<{ index: number; result: RowTaskResult }>> = [];
    const fallbackTasks: Array<{ index: number; task: RowTask }> = [];

    ranges.forEach((range, index) => {
      const task = createRowTask(viewport, range, width, height, buffer);
      const worker = this.workers[index];
      if (worker && !worker.stopped) {
        dispatched.push(this.runOnWorker(worker, index, task).then((result) => ({ index, result })));
      } else {
        fallbackTasks.push({ index, task });
      }
    });

    // The calling thread takes the orphaned ranges while the workers run.
    for (const { index, task } of fallbackTasks) {
      const result = computeRows(task);
      this.performanceMonitor.recordRange(roundId, index, result.computeTime, true);
    }

    let completed: Array<{ index: number; result: RowTaskResult }>;
    try {
      completed = await Promise.all(dispatched);
    } catch (error) {
      this.performanceMonitor.abortRound(roundId);
      this.logger.error("Compute round failed:", error);
      throw new ComputeRoundError(
        `Compute round failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    for (const { index, result } of completed) {
      this.performanceMonitor.recordRange(roundId, index, result.computeTime, false);
    }
    const metrics = this.performanceMonitor.endRound(roundId);
    this.logger.log(
      `Compute round complete: ${width}x${height}, ${ranges.length} ranges ` +
        `(${metrics.fallbackRanges} on main thread) in ${metrics.duration.toFixed(1)}ms ` +
        `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s)`
    );

    return { width, height, maxIter: viewport.maxIter, data: new Int32Array(buffer) };
  }

  private async runOnWorker(worker: PooledWorker, index: number, task: RowTask): Promise<RowTaskResult> {
    const watch = watchFailure(worker.handle);
    try {
      return await Promise.race([worker.api.computeRows(task), watch.failed]);
    } catch (error) {
      this.logger.error(`Worker ${index} failed to compute rows ${task.range.startRow}-${task.range.endRow}:`, error);
      throw error;
    } finally {
      watch.dispose();
    }
  }

  /**
   * Terminates all workers. The renderer can be initialized again afterwards.
   */
  async terminate(): Promise<void> {
    const workers = this.workers;
    this.workers = [];
    this.isInitialized = false;

    await Promise.all(
      workers.map(async (worker) => {
        if (!worker) return;
        worker.api[Comlink.releaseProxy]();
        await worker.handle.terminate();
      })
    );
    this.logger.log("ParallelRenderer terminated");
  }

  /**
   * Gets the configured pool size.
   */
  getWorkerCount(): number {
    return this.workerCount;
  }

  /**
   * Gets the number of workers currently able to take rows.
   */
  getStartedWorkerCount(): number {
    return this.workers.filter((worker) => worker !== null && !worker.stopped).length;
  }

  getPerformanceMonitor(): PerformanceMonitor {
    return this.performanceMonitor;
  }
}
