/**
 * Input rejected at the program boundary (command line, custom palette).
 * The message is meant to be printed to the user as is.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The shared iteration buffer for a compute round could not be allocated.
 * The round is abandoned before any worker starts, so the previous grid stays valid.
 */
export class GridAllocationError extends Error {
  constructor(
    readonly width: number,
    readonly height: number,
    options?: ErrorOptions
  ) {
    super(`Out of memory: cannot allocate a ${width}x${height} iteration grid`, options);
    this.name = "GridAllocationError";
  }
}

/**
 * A worker failed after the round had started. No partial grid is returned.
 */
export class ComputeRoundError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ComputeRoundError";
  }
}
