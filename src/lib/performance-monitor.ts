import { performance } from "node:perf_hooks";

/**
 * Metrics for a single row range.
 */
export interface RangeMetrics {
  rangeIndex: number;
  computeTime: number; // milliseconds
  /** Computed on the calling thread because no worker was available */
  fallback: boolean;
}

/**
 * Metrics for a complete compute round.
 */
export interface RoundMetrics {
  roundId: number;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalRanges: number;
  completedRanges: number;
  fallbackRanges: number;
  totalPixels: number;
  pixelsPerSecond: number;
  averageRangeTime: number;
}

interface ActiveRound {
  roundId: number;
  startTime: number;
  totalRanges: number;
  totalPixels: number;
  ranges: RangeMetrics[];
}

/**
 * Performance monitor for fork-join compute rounds.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const roundId = monitor.startRound(ranges.length, width * height);
 * monitor.recordRange(roundId, 0, 12.5, false);
 * const metrics = monitor.endRound(roundId);
 * ```
 */
export class PerformanceMonitor {
  private activeRounds = new Map<number, ActiveRound>();
  private completedRounds: RoundMetrics[] = [];
  private nextRoundId = 1;

  constructor(private maxHistorySize = 50) {}

  startRound(totalRanges: number, totalPixels: number): number {
    const roundId = this.nextRoundId++;
    this.activeRounds.set(roundId, {
      roundId,
      startTime: performance.now(),
      totalRanges,
      totalPixels,
      ranges: [],
    });
    return roundId;
  }

  recordRange(roundId: number, rangeIndex: number, computeTime: number, fallback: boolean): void {
    const round = this.activeRounds.get(roundId);
    if (!round) {
      throw new Error(`PerformanceMonitor: Unknown round ${roundId}`);
    }
    round.ranges.push({ rangeIndex, computeTime, fallback });
  }

  endRound(roundId: number): RoundMetrics {
    const round = this.activeRounds.get(roundId);
    if (!round) {
      throw new Error(`PerformanceMonitor: Unknown round ${roundId}`);
    }

    const endTime = performance.now();
    const duration = endTime - round.startTime;
    const totalRangeTime = round.ranges.reduce((sum, range) => sum + range.computeTime, 0);

    const metrics: RoundMetrics = {
      roundId,
      startTime: round.startTime,
      endTime,
      duration,
      totalRanges: round.totalRanges,
      completedRanges: round.ranges.length,
      fallbackRanges: round.ranges.filter((range) => range.fallback).length,
      totalPixels: round.totalPixels,
      pixelsPerSecond: duration > 0 ? (round.totalPixels / duration) * 1000 : 0,
      averageRangeTime: round.ranges.length > 0 ? totalRangeTime / round.ranges.length : 0,
    };

    this.completedRounds.push(metrics);
    if (this.completedRounds.length > this.maxHistorySize) {
      this.completedRounds.shift();
    }
    this.activeRounds.delete(roundId);

    return metrics;
  }

  /** Drops a round that failed; it is not added to the history. */
  abortRound(roundId: number): void {
    this.activeRounds.delete(roundId);
  }

  getLastRoundMetrics(): RoundMetrics | null {
    return this.completedRounds.length > 0 ? this.completedRounds[this.completedRounds.length - 1] : null;
  }

  getHistory(): RoundMetrics[] {
    return [...this.completedRounds];
  }
}
