/**
 * Concurrency sweep comparisons
 *
 * Each target's run at concurrency 1 is its sequential baseline. Speedup is
 * baseline upload mean / upload mean; improvement is the share of the
 * baseline time saved.
 */

import type { BenchmarkResult } from "./runner.js";

function baselineFor(
  results: BenchmarkResult[],
  label: string,
): BenchmarkResult | undefined {
  return results.find(
    (result) =>
      result.label === label && result.concurrency === 1 && result.upload,
  );
}

/**
 * Fill in speedup and improvement for every result that has a baseline
 */
export function compareToBaseline(
  results: BenchmarkResult[],
): BenchmarkResult[] {
  return results.map((result) => {
    const base = baselineFor(results, result.label)?.upload?.meanMs;
    const time = result.upload?.meanMs;
    if (base === undefined || time === undefined || base <= 0 || time <= 0) {
      return { ...result, speedup: null, improvementPct: null };
    }

    return {
      ...result,
      speedup: base / time,
      improvementPct: ((base - time) / base) * 100,
    };
  });
}

/**
 * Fastest upload per target, in first-seen target order
 */
export function bestConcurrency(results: BenchmarkResult[]): BenchmarkResult[] {
  const best = new Map<string, BenchmarkResult>();
  for (const result of results) {
    if (!result.upload) continue;
    const current = best.get(result.label)?.upload;
    if (!current || result.upload.meanMs < current.meanMs) {
      best.set(result.label, result);
    }
  }
  return [...best.values()];
}
