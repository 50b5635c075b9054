/**
 * Transfer error classes
 */

import type { TransferFailed, TransferReport } from "./types.js";

/**
 * Base error class for all transfer errors
 */
export class TransferError extends Error {
  constructor(
    message: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = "TransferError";
    // Maintain proper stack trace for V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when one or more items of a bulk run failed
 *
 * Carries the whole report so callers can see which items made it.
 */
export class BulkTransferError extends TransferError {
  public readonly failures: TransferFailed[];

  constructor(public readonly report: TransferReport) {
    const failures = report.results.filter(
      (r): r is TransferFailed => r.status === "failed",
    );
    super(
      `Bulk ${report.direction} to ${report.container} completed with ${failures.length} of ${report.total} items failed`,
      failures[0]?.error,
    );
    this.name = "BulkTransferError";
    this.failures = failures;
  }
}

/**
 * Thrown when a bucket/container does not exist
 */
export class ContainerNotFoundError extends TransferError {
  constructor(
    public readonly container: string,
    cause?: Error,
  ) {
    super(`Container not found: ${container}`, cause);
    this.name = "ContainerNotFoundError";
  }
}

/**
 * Thrown when an object does not exist
 */
export class ObjectNotFoundError extends TransferError {
  constructor(
    public readonly container: string,
    public readonly key: string,
    cause?: Error,
  ) {
    super(`Object not found: ${container}/${key}`, cause);
    this.name = "ObjectNotFoundError";
  }
}

/**
 * Thrown when a storage path is empty or escapes its root
 */
export class InvalidTransferPathError extends TransferError {
  constructor(
    public readonly path: string,
    message?: string,
  ) {
    super(message || `Invalid transfer path: ${path}`);
    this.name = "InvalidTransferPathError";
  }
}

/**
 * Thrown for invalid options (e.g., a non-positive worker count)
 */
export class TransferConfigError extends TransferError {
  constructor(message: string) {
    super(message);
    this.name = "TransferConfigError";
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === "string" ? value : String(value));
}
