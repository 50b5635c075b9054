/**
 * Bulk transfer API
 *
 * Turns lists of (localPath, storagePath) pairs, or whole directory trees,
 * into single-object calls on an ObjectStore and runs them on a bounded
 * worker pool.
 */

import { join } from "node:path";
import {
  BulkTransferError,
  InvalidTransferPathError,
  toError,
} from "./errors.js";
import { ensureParentDir, listLocalFiles } from "./local-files.js";
import {
  baseName,
  isFolderMarker,
  joinStoragePath,
  localPathForKey,
  normalizeStoragePath,
  storagePrefix,
} from "./paths.js";
import {
  assertConcurrency,
  DEFAULT_CONCURRENCY,
  runWithConcurrency,
} from "./pool.js";
import type {
  NativeTransferOutcome,
  ObjectStore,
  StorageTransferPath,
  TransferConfig,
  TransferDirection,
  TransferItemResult,
  TransferLogger,
  TransferOptions,
  TransferReport,
} from "./types.js";

/**
 * BulkTransfer configuration
 */
export interface BulkTransferConfig extends TransferConfig {
  /** Default worker count (default: 50) */
  concurrency?: number;

  /** Log every item at info level instead of debug */
  verbose?: boolean;
}

/**
 * Options for uploading loose files under their base names
 */
export interface UploadFilesOptions extends TransferOptions {
  /** Storage directory to place the files in (default: container root) */
  storageDir?: string;
}

/**
 * One unit of work for the pool
 *
 * `invalid` is set when the pair could not be mapped; the item is then
 * reported as failed without touching the store.
 */
interface PendingItem {
  path: StorageTransferPath;
  invalid?: Error;
}

function toList(
  paths: StorageTransferPath | StorageTransferPath[],
): StorageTransferPath[] {
  return Array.isArray(paths) ? paths : [paths];
}

function toInvalidPathError(error: unknown, path: string): Error {
  return error instanceof InvalidTransferPathError
    ? error
    : new InvalidTransferPathError(path, toError(error).message);
}

/**
 * No-op logger for when none is provided
 */
const noopLogger: TransferLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Bulk transfer client over a single ObjectStore
 *
 * @example
 * ```typescript
 * const bulk = new BulkTransfer(new S3ObjectStore({ region: 'us-east-1' }));
 * await bulk.uploadDirectory('test-bucket', 'test_dir', 'my_storage_dir');
 * await bulk.download('test-bucket', [
 *   { storagePath: 'my_storage_dir/f4', localPath: 'f5' },
 * ]);
 * ```
 */
export class BulkTransfer {
  private readonly concurrency: number;
  private readonly verbose: boolean;
  private readonly logger: TransferLogger;

  constructor(
    private readonly store: ObjectStore,
    config: BulkTransferConfig = {},
  ) {
    this.concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    assertConcurrency(this.concurrency);
    this.verbose = config.verbose ?? false;
    this.logger = config.logger ?? noopLogger;

    this.logger.debug(
      { provider: store.provider, concurrency: this.concurrency },
      "BulkTransfer initialized",
    );
  }

  // ---- Explicit path lists ----

  /**
   * Upload arbitrary local files to the given keys
   */
  async upload(
    container: string,
    paths: StorageTransferPath | StorageTransferPath[],
    options: TransferOptions = {},
  ): Promise<TransferReport> {
    const items = this.prepareUploads(paths);

    if (options.useTransferManager && this.store.uploadMany) {
      const report = await this.tryNativeUpload(container, items, options);
      if (report) {
        return this.finish(report, options);
      }
    }

    const report = await this.run("upload", container, items, options, (p) =>
      this.store.uploadFile(container, p.localPath, p.storagePath),
    );
    return this.finish(report, options);
  }

  /**
   * Download arbitrary keys to the given local files
   *
   * Keys are passed to the store exactly as given. Parent directories are
   * created as needed.
   */
  async download(
    container: string,
    paths: StorageTransferPath | StorageTransferPath[],
    options: TransferOptions = {},
  ): Promise<TransferReport> {
    const items = toList(paths).map((path) => ({ path: { ...path } }));
    return this.downloadItems(container, items, options);
  }

  private async downloadItems(
    container: string,
    items: PendingItem[],
    options: TransferOptions,
  ): Promise<TransferReport> {
    const report = await this.run(
      "download",
      container,
      items,
      options,
      async (p) => {
        await ensureParentDir(p.localPath);
        return this.store.downloadFile(container, p.storagePath, p.localPath);
      },
    );
    return this.finish(report, options);
  }

  // ---- Directory trees ----

  /**
   * Upload a whole directory, preserving its structure under storageDir
   *
   * @param localDir - Directory to upload
   * @param storageDir - Destination "directory" in the container ('' = root)
   */
  async uploadDirectory(
    container: string,
    localDir: string,
    storageDir = "",
    options: TransferOptions = {},
  ): Promise<TransferReport> {
    const files = await listLocalFiles(localDir);
    const prefix = storagePrefix(storageDir);

    const paths = files.map((relativePath) => ({
      localPath: join(localDir, ...relativePath.split("/")),
      storagePath: joinStoragePath(prefix, relativePath),
    }));

    this.logger.debug(
      { container, localDir, storageDir, files: paths.length },
      "Directory enumerated for upload",
    );

    return this.upload(container, paths, options);
  }

  /**
   * Download every object under storageDir into localDir, preserving structure
   *
   * @param storageDir - Source "directory" in the container ('' = root)
   * @param localDir - Destination directory
   */
  async downloadDirectory(
    container: string,
    storageDir: string,
    localDir: string,
    options: TransferOptions = {},
  ): Promise<TransferReport> {
    const keys = await this.store.listKeys(container, storagePrefix(storageDir));

    const items = keys
      .filter((key) => !isFolderMarker(key))
      .map((key): PendingItem => {
        try {
          return {
            path: {
              storagePath: key,
              localPath: localPathForKey(localDir, storageDir, key),
            },
          };
        } catch (error) {
          return {
            path: { storagePath: key, localPath: localDir },
            invalid: toInvalidPathError(error, key),
          };
        }
      });

    this.logger.debug(
      { container, storageDir, localDir, objects: items.length },
      "Directory listed for download",
    );

    return this.downloadItems(container, items, options);
  }

  // ---- Loose files ----

  /**
   * Upload local files under their base names
   */
  async uploadFiles(
    container: string,
    files: string[],
    options: UploadFilesOptions = {},
  ): Promise<TransferReport> {
    const { storageDir = "", ...transferOptions } = options;
    const prefix = storagePrefix(storageDir);

    const paths = files.map((file) => ({
      localPath: file,
      storagePath: `${prefix}${baseName(file)}`,
    }));

    return this.upload(container, paths, transferOptions);
  }

  /**
   * Download keys into localDir under their base names
   */
  async downloadFiles(
    container: string,
    keys: string[],
    localDir: string,
    options: TransferOptions = {},
  ): Promise<TransferReport> {
    const paths = keys.map((key) => ({
      storagePath: key,
      localPath: join(localDir, baseName(key)),
    }));

    return this.download(container, paths, options);
  }

  // ---- Container and object helpers ----

  async createContainer(container: string): Promise<boolean> {
    const created = await this.store.createContainer(container);
    this.logger.info({ container, created }, "Container ready");
    return created;
  }

  async deleteContainer(container: string): Promise<void> {
    await this.store.deleteContainer(container);
    this.logger.info({ container }, "Container deleted");
  }

  async exists(container: string, key: string): Promise<boolean> {
    return this.store.exists(container, key);
  }

  /**
   * List keys under a storage directory ('' = whole container)
   */
  async list(container: string, storageDir = ""): Promise<string[]> {
    return this.store.listKeys(container, storagePrefix(storageDir));
  }

  /**
   * Delete every object in a container
   *
   * @returns Number of objects deleted
   */
  async emptyContainer(container: string): Promise<number> {
    const keys = await this.store.listKeys(container);
    const deleted = keys.length > 0 ? await this.store.deleteKeys(container, keys) : 0;
    this.logger.info({ container, deleted }, "Container emptied");
    return deleted;
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  // ---- Internals ----

  /**
   * Normalize upload destinations, one item at a time
   */
  private prepareUploads(
    paths: StorageTransferPath | StorageTransferPath[],
  ): PendingItem[] {
    return toList(paths).map((path) => {
      try {
        return {
          path: {
            localPath: path.localPath,
            storagePath: normalizeStoragePath(path.storagePath),
          },
        };
      } catch (error) {
        return {
          path: { ...path },
          invalid: toInvalidPathError(error, path.storagePath),
        };
      }
    });
  }

  /**
   * Fan items out on the pool and fold the outcomes into a report
   */
  private async run(
    direction: TransferDirection,
    container: string,
    items: PendingItem[],
    options: TransferOptions,
    transferOne: (path: StorageTransferPath) => Promise<number>,
  ): Promise<TransferReport> {
    const concurrency = options.concurrency ?? this.concurrency;
    const startedAt = Date.now();
    let completed = 0;
    let failed = 0;

    this.logger.debug(
      { direction, container, items: items.length, concurrency },
      "Bulk transfer started",
    );

    const settled = await runWithConcurrency(
      items,
      concurrency,
      async ({ path, invalid }): Promise<TransferItemResult> => {
        const itemStart = Date.now();
        let result: TransferItemResult;
        try {
          if (invalid) throw invalid;
          const bytes = await transferOne(path);
          result = {
            status: "succeeded",
            path,
            bytes,
            durationMs: Date.now() - itemStart,
          };
        } catch (error) {
          result = {
            status: "failed",
            path,
            error: toError(error),
            durationMs: Date.now() - itemStart,
          };
        }

        completed++;
        if (result.status === "failed") failed++;
        this.logItem(direction, container, result);
        options.onProgress?.({
          direction,
          completed,
          failed,
          total: items.length,
          result,
        });

        return result;
      },
    );

    // Workers never reject; the mapping keeps the types honest
    const results = settled.map((s, i): TransferItemResult =>
      s.status === "fulfilled"
        ? s.value
        : {
            status: "failed",
            path: items[i]?.path ?? { localPath: "", storagePath: "" },
            error: toError(s.reason),
            durationMs: 0,
          },
    );

    return buildReport(direction, container, results, Date.now() - startedAt);
  }

  /**
   * Upload through the store's native bulk path
   *
   * @returns The report, or null when the native path failed as a whole
   */
  private async tryNativeUpload(
    container: string,
    items: PendingItem[],
    options: TransferOptions,
  ): Promise<TransferReport | null> {
    const uploadMany = this.store.uploadMany?.bind(this.store);
    if (!uploadMany) return null;

    const concurrency = options.concurrency ?? this.concurrency;
    assertConcurrency(concurrency);
    const startedAt = Date.now();

    // Invalid pairs never reach the SDK
    const valid = items.flatMap((item) => (item.invalid ? [] : [item.path]));

    let validOutcomes: NativeTransferOutcome[];
    try {
      validOutcomes =
        valid.length > 0 ? await uploadMany(container, valid, concurrency) : [];
    } catch (error) {
      this.logger.warn(
        {
          provider: this.store.provider,
          container,
          error: toError(error).message,
        },
        "Native bulk upload failed, falling back to worker pool",
      );
      return null;
    }

    const durationMs = Date.now() - startedAt;
    let completed = 0;
    let failed = 0;

    let next = 0;
    const outcomes = items.map(
      (item): NativeTransferOutcome | undefined =>
        item.invalid
          ? { status: "failed", error: item.invalid }
          : validOutcomes[next++],
    );

    const results = items.map(({ path }, i): TransferItemResult => {
      const outcome = outcomes[i];
      const result: TransferItemResult =
        outcome?.status === "succeeded"
          ? { status: "succeeded", path, bytes: outcome.bytes, durationMs }
          : {
              status: "failed",
              path,
              error:
                outcome?.error ??
                new Error("Native bulk upload returned no outcome"),
              durationMs,
            };

      completed++;
      if (result.status === "failed") failed++;
      this.logItem("upload", container, result);
      options.onProgress?.({
        direction: "upload",
        completed,
        failed,
        total: items.length,
        result,
      });
      return result;
    });

    return buildReport("upload", container, results, durationMs);
  }

  private logItem(
    direction: TransferDirection,
    container: string,
    result: TransferItemResult,
  ): void {
    const context = {
      direction,
      container,
      localPath: result.path.localPath,
      storagePath: result.path.storagePath,
      durationMs: result.durationMs,
    };

    if (result.status === "failed") {
      this.logger.error(
        { ...context, error: result.error.message },
        "Transfer failed",
      );
      return;
    }

    const log = this.verbose ? this.logger.info : this.logger.debug;
    log.call(this.logger, { ...context, bytes: result.bytes }, "Transferred");
  }

  private finish(report: TransferReport, options: TransferOptions): TransferReport {
    this.logger.info(
      {
        provider: this.store.provider,
        direction: report.direction,
        container: report.container,
        total: report.total,
        succeeded: report.succeeded,
        failed: report.failed,
        bytes: report.bytes,
        durationMs: report.durationMs,
      },
      "Bulk transfer finished",
    );

    if (report.failed > 0 && (options.throwOnError ?? true)) {
      throw new BulkTransferError(report);
    }
    return report;
  }
}

/**
 * Fold item results into a report
 */
export function buildReport(
  direction: TransferDirection,
  container: string,
  results: TransferItemResult[],
  durationMs: number,
): TransferReport {
  let succeeded = 0;
  let bytes = 0;
  for (const result of results) {
    if (result.status === "succeeded") {
      succeeded++;
      bytes += result.bytes;
    }
  }

  return {
    direction,
    container,
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    bytes,
    durationMs,
    results,
  };
}

/**
 * Upload local files under their base names with a one-off BulkTransfer
 *
 * The store is left open for the caller.
 */
export async function bulkUploadFiles(
  store: ObjectStore,
  container: string,
  files: string[],
  options: UploadFilesOptions & BulkTransferConfig = {},
): Promise<TransferReport> {
  const { logger, verbose, concurrency, ...uploadOptions } = options;
  const bulk = new BulkTransfer(store, { logger, verbose, concurrency });
  return bulk.uploadFiles(container, files, uploadOptions);
}

/**
 * Download keys into a directory with a one-off BulkTransfer
 *
 * The store is left open for the caller.
 */
export async function bulkDownloadFiles(
  store: ObjectStore,
  container: string,
  keys: string[],
  localDir: string,
  options: TransferOptions & BulkTransferConfig = {},
): Promise<TransferReport> {
  const { logger, verbose, concurrency, ...downloadOptions } = options;
  const bulk = new BulkTransfer(store, { logger, verbose, concurrency });
  return bulk.downloadFiles(container, keys, localDir, downloadOptions);
}
