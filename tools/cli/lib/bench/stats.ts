/**
 * Timing statistics for benchmark iterations
 */

import { filesPerSecond, throughputMBps } from "@cloudbulk/core";

export interface TimingSummary {
  /** Mean duration in ms */
  meanMs: number;
  minMs: number;
  maxMs: number;
  /** Sample standard deviation in ms (0 for fewer than two samples) */
  stdDevMs: number;
  /** MB/s at the mean duration */
  mbps: number;
  /** Files/s at the mean duration */
  filesPerSecond: number;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation
 */
export function stdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Summarize per-iteration durations for a batch of `files` totalling `bytes`
 *
 * @throws Error for an empty list of durations
 */
export function summarizeTimings(
  durationsMs: number[],
  files: number,
  bytes: number,
): TimingSummary {
  if (durationsMs.length === 0) {
    throw new Error("No timings to summarize");
  }

  const meanMs = mean(durationsMs);
  return {
    meanMs,
    minMs: Math.min(...durationsMs),
    maxMs: Math.max(...durationsMs),
    stdDevMs: stdDev(durationsMs),
    mbps: throughputMBps(bytes, meanMs),
    filesPerSecond: filesPerSecond(files, meanMs),
  };
}
