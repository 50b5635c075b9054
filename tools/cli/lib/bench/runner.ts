/**
 * Benchmark runner
 *
 * Times repeated bulk uploads (and directory downloads) of the same set of
 * generated files against one ObjectStore, then cleans up according to the
 * cleanup policy.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type CleanupPolicy, shouldCleanup } from "@cloudbulk/core";
import {
  BulkTransfer,
  baseName,
  joinStoragePath,
  type ObjectStore,
  type StorageTransferPath,
  type TransferLogger,
  toError,
} from "@cloudbulk/transfer";
import type { TestFiles } from "./fixtures.js";
import { summarizeTimings, type TimingSummary } from "./stats.js";

/**
 * One column of the comparison: a store and how to drive it
 */
export interface BenchmarkTarget {
  /** Name shown in reports (e.g. 's3', 'gcs-transfer-manager') */
  label: string;
  store: ObjectStore;
  /** Upload through the store's native bulk path */
  useTransferManager?: boolean;
  /** Time downloads as well (default: true) */
  download?: boolean;
}

export interface BenchmarkOptions {
  container: string;
  testFiles: TestFiles;
  iterations: number;
  concurrency: number;
  cleanup: CleanupPolicy;
  /** Storage directory the files are uploaded under (default: 'bench') */
  storageDir?: string;
  logger?: TransferLogger;
  /** Called when a phase starts, for spinners */
  onPhase?: (phase: string) => void;
}

export interface BenchmarkResult {
  label: string;
  provider: string;
  container: string;
  files: number;
  bytes: number;
  iterations: number;
  /** Worker count the run used */
  concurrency: number;
  /** Null when no upload completed */
  upload: TimingSummary | null;
  /** Null when downloads were skipped or none completed */
  download: TimingSummary | null;
  /** Sequential upload mean over this upload mean; null without a baseline */
  speedup: number | null;
  /** Upload time saved against the sequential baseline, in percent */
  improvementPct: number | null;
  errors: string[];
}

/**
 * Benchmark one target
 *
 * Errors do not reject: they end the run early and are reported in
 * `errors`. Cleanup always runs.
 */
export async function runBenchmark(
  target: BenchmarkTarget,
  options: BenchmarkOptions,
): Promise<BenchmarkResult> {
  const {
    container,
    testFiles,
    iterations,
    concurrency,
    cleanup,
    storageDir = "bench",
    logger,
    onPhase,
  } = options;

  const bulk = new BulkTransfer(target.store, { concurrency, logger });
  const uploadTimes: number[] = [];
  const downloadTimes: number[] = [];
  const errors: string[] = [];
  let created = false;

  const paths: StorageTransferPath[] = testFiles.files.map((file) => ({
    localPath: file,
    storagePath: joinStoragePath(storageDir, baseName(file)),
  }));

  try {
    onPhase?.(`${target.label}: preparing ${container}`);
    created = await bulk.createContainer(container);

    for (let i = 1; i <= iterations; i++) {
      onPhase?.(`${target.label}: upload ${i}/${iterations}`);
      const upload = await bulk.upload(container, paths, {
        useTransferManager: target.useTransferManager,
      });
      uploadTimes.push(upload.durationMs);

      if (target.download ?? true) {
        onPhase?.(`${target.label}: download ${i}/${iterations}`);
        const downloadDir = await mkdtemp(join(tmpdir(), "cloudbulk-download-"));
        try {
          const download = await bulk.downloadDirectory(
            container,
            storageDir,
            downloadDir,
          );
          downloadTimes.push(download.durationMs);
        } finally {
          await rm(downloadDir, { recursive: true, force: true });
        }
      }
    }
  } catch (error) {
    errors.push(toError(error).message);
  }

  onPhase?.(`${target.label}: cleaning up`);
  await cleanupContainer(target.store, bulk, {
    container,
    storageDir,
    created,
    policy: cleanup,
    errors,
  });

  const files = testFiles.files.length;
  return {
    label: target.label,
    provider: target.store.provider,
    container,
    files,
    bytes: testFiles.totalBytes,
    iterations,
    concurrency,
    upload:
      uploadTimes.length > 0
        ? summarizeTimings(uploadTimes, files, testFiles.totalBytes)
        : null,
    download:
      downloadTimes.length > 0
        ? summarizeTimings(downloadTimes, files, testFiles.totalBytes)
        : null,
    speedup: null,
    improvementPct: null,
    errors,
  };
}

/**
 * Remove the uploaded objects and the container as the policy allows
 *
 * Only objects under the benchmark's storage directory are deleted, and
 * only containers created by this run are removed.
 */
async function cleanupContainer(
  store: ObjectStore,
  bulk: BulkTransfer,
  run: {
    container: string;
    storageDir: string;
    created: boolean;
    policy: CleanupPolicy;
    errors: string[];
  },
): Promise<void> {
  try {
    if (shouldCleanup(run.policy, "data")) {
      const keys = await bulk.list(run.container, run.storageDir);
      if (keys.length > 0) {
        await store.deleteKeys(run.container, keys);
      }
    }
    if (run.created && shouldCleanup(run.policy, "buckets")) {
      await bulk.deleteContainer(run.container);
    }
  } catch (error) {
    run.errors.push(`Cleanup failed: ${toError(error).message}`);
  }
}
