/**
 * @cloudbulk/transfer/core - Zero-dependency core types for bulk transfers
 *
 * These interfaces define the contract between the bulk transfer layer and
 * the backend adapters. Adapters wrap a vendor SDK; everything else in this
 * package only talks to the ObjectStore port.
 */

// ============================================================================
// Transfer Paths
// ============================================================================

/**
 * A single local file paired with its location in the bucket/container
 */
export interface StorageTransferPath {
  /** Path on the local filesystem */
  localPath: string;

  /** Object key inside the bucket/container (e.g., 'reports/2024/q1.csv') */
  storagePath: string;
}

export type TransferDirection = "upload" | "download";

// ============================================================================
// Results
// ============================================================================

export interface TransferSucceeded {
  status: "succeeded";
  path: StorageTransferPath;
  /** Bytes moved for this item */
  bytes: number;
  durationMs: number;
}

export interface TransferFailed {
  status: "failed";
  path: StorageTransferPath;
  error: Error;
  durationMs: number;
}

/**
 * Outcome of one item in a bulk run
 */
export type TransferItemResult = TransferSucceeded | TransferFailed;

/**
 * Aggregate outcome of a bulk run
 */
export interface TransferReport {
  direction: TransferDirection;
  container: string;

  /** Number of items submitted */
  total: number;
  succeeded: number;
  failed: number;

  /** Total bytes moved by the succeeded items */
  bytes: number;

  /** Wall-clock time for the whole batch */
  durationMs: number;

  /** Per-item outcomes, in input order */
  results: TransferItemResult[];
}

/**
 * Emitted after each item settles
 */
export interface TransferProgress {
  direction: TransferDirection;
  completed: number;
  failed: number;
  total: number;
  result: TransferItemResult;
}

// ============================================================================
// Options
// ============================================================================

export interface TransferOptions {
  /** Worker count for this call (defaults to the BulkTransfer setting) */
  concurrency?: number;

  /** Reject with BulkTransferError when any item fails (default: true) */
  throwOnError?: boolean;

  /** Called after every item settles */
  onProgress?: (progress: TransferProgress) => void;

  /**
   * Route uploads through the store's native bulk path when it has one
   * (e.g. the GCS transfer manager). Falls back to the worker pool if the
   * native path fails.
   */
  useTransferManager?: boolean;
}

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface required by the transfer layer
 *
 * pino loggers satisfy it, as does anything with the same four methods.
 */
export interface TransferLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

/**
 * Base configuration shared by BulkTransfer and the adapters
 */
export interface TransferConfig {
  logger?: TransferLogger;
}

// ============================================================================
// ObjectStore Interface
// ============================================================================

/**
 * Outcome of a single upload or download inside an adapter's native bulk path
 */
export type NativeTransferOutcome =
  | { status: "succeeded"; bytes: number }
  | { status: "failed"; error: Error };

/**
 * Backend port - one implementation per vendor SDK
 *
 * "Container" is the S3/GCS bucket or the Azure blob container.
 */
export interface ObjectStore {
  /** Short provider name used in logs and reports (e.g. 's3') */
  readonly provider: string;

  // ---- Containers ----

  /**
   * Create a bucket/container
   *
   * @returns true if created, false if it already existed
   */
  createContainer(container: string): Promise<boolean>;

  /**
   * Delete an empty bucket/container
   */
  deleteContainer(container: string): Promise<void>;

  // ---- Single-object transfers ----

  /**
   * Upload one local file
   *
   * @returns Number of bytes uploaded
   * @throws ContainerNotFoundError if the container does not exist
   */
  uploadFile(container: string, localPath: string, key: string): Promise<number>;

  /**
   * Download one object into a local file
   *
   * The parent directory of localPath must already exist.
   *
   * @returns Number of bytes written
   * @throws ObjectNotFoundError if the object does not exist
   */
  downloadFile(
    container: string,
    key: string,
    localPath: string,
  ): Promise<number>;

  /**
   * Optional native bulk upload, one outcome per path in input order
   */
  uploadMany?(
    container: string,
    paths: StorageTransferPath[],
    concurrency: number,
  ): Promise<NativeTransferOutcome[]>;

  // ---- Objects ----

  /**
   * Check if an object exists
   */
  exists(container: string, key: string): Promise<boolean>;

  /**
   * List every key under a prefix, across all pages, sorted ascending
   */
  listKeys(container: string, prefix?: string): Promise<string[]>;

  /**
   * Delete the given keys
   *
   * @returns Number of keys deleted
   */
  deleteKeys(container: string, keys: string[]): Promise<number>;

  // ---- Lifecycle ----

  /**
   * Release SDK resources
   */
  close(): Promise<void>;
}
