/**
 * Batch correlation for log lines
 *
 * A batch is one bulk operation: a single `upload`/`download`/`put`/`get`
 * invocation of the CLI, or one benchmark run across its providers and
 * iterations. Every item transferred inside it logs the same `batchId`, so
 * the lines of one run can be pulled out of interleaved output.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export interface BatchContext {
  batchId: string;
}

const batchStorage = new AsyncLocalStorage<BatchContext>();

/**
 * The batch id of the enclosing runWithBatchId call, if any
 */
export function getBatchId(): string | undefined {
  return batchStorage.getStore()?.batchId;
}

/**
 * Run fn with batchId attached to every log line it produces, including
 * those of the worker pool it starts
 */
export function runWithBatchId<T>(batchId: string, fn: () => T): T {
  return batchStorage.run({ batchId }, fn);
}
