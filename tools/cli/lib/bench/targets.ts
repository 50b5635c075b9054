/**
 * Which stores a benchmark run compares
 */

import { type Provider, parseProvider } from "@cloudbulk/core";
import type { ObjectStore } from "@cloudbulk/transfer";
import type { BenchmarkTarget } from "./runner.js";

/**
 * Parse a comma-separated provider list, dropping duplicates
 *
 * @throws Error for an unknown provider or an empty list
 */
export function parseProviderList(value: string): Provider[] {
  const providers = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map(parseProvider);

  if (providers.length === 0) {
    throw new Error("No providers given");
  }
  return [...new Set(providers)];
}

/**
 * Parse a comma-separated list of worker counts, sorted and deduplicated
 *
 * @param withBaseline - Add a sequential run (concurrency 1)
 * @throws Error for a non-positive or non-integer level, or an empty list
 */
export function parseConcurrencyLevels(
  value: string,
  withBaseline = false,
): number[] {
  const levels = value
    .split(",")
    .map((level) => level.trim())
    .filter((level) => level.length > 0)
    .map((level) => {
      const parsed = Number(level);
      if (!Number.isInteger(parsed) || parsed < 1) {
        throw new Error(`Concurrency levels must be positive integers, got ${level}`);
      }
      return parsed;
    });

  if (levels.length === 0) {
    throw new Error("No concurrency levels given");
  }
  if (withBaseline) levels.push(1);
  return [...new Set(levels)].sort((a, b) => a - b);
}

/**
 * One target per provider, plus a transfer-manager target for gcs when asked
 *
 * The transfer-manager target gets its own store so its timings do not
 * share connections with the plain gcs run.
 */
export function planTargets(
  providers: Provider[],
  options: { transferManager: boolean; download: boolean },
  createStore: (provider: Provider) => ObjectStore,
): BenchmarkTarget[] {
  const targets: BenchmarkTarget[] = [];

  for (const provider of providers) {
    targets.push({
      label: provider,
      store: createStore(provider),
      download: options.download,
    });

    if (provider === "gcs" && options.transferManager) {
      targets.push({
        label: "gcs-transfer-manager",
        store: createStore(provider),
        useTransferManager: true,
        download: options.download,
      });
    }
  }

  return targets;
}
