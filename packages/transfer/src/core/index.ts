/**
 * @cloudbulk/transfer/core - Core types, errors, path mapping and the bulk API
 *
 * Nothing in here imports a vendor SDK. Adapters live under their own
 * export paths so that consumers only load the SDKs they use.
 */

// Types
export type {
  StorageTransferPath,
  TransferDirection,
  TransferSucceeded,
  TransferFailed,
  TransferItemResult,
  TransferReport,
  TransferProgress,
  TransferOptions,
  TransferLogger,
  TransferConfig,
  NativeTransferOutcome,
  ObjectStore,
} from "./types.js";

// Errors
export {
  TransferError,
  BulkTransferError,
  ContainerNotFoundError,
  ObjectNotFoundError,
  InvalidTransferPathError,
  TransferConfigError,
  toError,
} from "./errors.js";

// Path utilities
export {
  normalizeStoragePath,
  joinStoragePath,
  storagePrefix,
  toPosixPath,
  localPathForKey,
  isFolderMarker,
  baseName,
} from "./paths.js";
export { listLocalFiles, ensureParentDir } from "./local-files.js";

// Worker pool
export {
  DEFAULT_CONCURRENCY,
  assertConcurrency,
  runWithConcurrency,
} from "./pool.js";

// Bulk API
export type { BulkTransferConfig, UploadFilesOptions } from "./bulk.js";
export {
  BulkTransfer,
  buildReport,
  bulkUploadFiles,
  bulkDownloadFiles,
} from "./bulk.js";
