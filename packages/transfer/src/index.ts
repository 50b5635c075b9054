/**
 * @cloudbulk/transfer - Bulk uploads and downloads over cloud storage SDKs
 *
 * This package fans lists of local/remote path pairs out across a bounded
 * worker pool, with one adapter per vendor SDK (AWS S3, Azure Blob Storage,
 * Google Cloud Storage) plus an in-memory store for tests.
 *
 * ## Usage
 *
 * Import the bulk API and core types from the main export:
 * ```typescript
 * import { BulkTransfer } from '@cloudbulk/transfer';
 * import type { StorageTransferPath, TransferReport } from '@cloudbulk/transfer';
 * ```
 *
 * Import adapters from their specific paths:
 * ```typescript
 * import { S3ObjectStore } from '@cloudbulk/transfer/s3';
 * import { AzureBlobObjectStore } from '@cloudbulk/transfer/azure';
 * import { GcsObjectStore } from '@cloudbulk/transfer/gcs';
 * import { MemoryObjectStore } from '@cloudbulk/transfer/memory';
 * ```
 */

// Re-export everything from core
export * from "./core/index.js";
