/**
 * Google Cloud Storage object store adapter
 *
 * Wraps @google-cloud/storage. Besides the single-object calls it exposes
 * uploadMany, which hands a whole batch to the SDK's TransferManager.
 */

import { rm, stat } from "node:fs/promises";
import {
  Storage,
  type StorageOptions,
  TransferManager,
} from "@google-cloud/storage";
import {
  ContainerNotFoundError,
  ObjectNotFoundError,
  TransferError,
  toError,
} from "../../core/errors.js";
import { runWithConcurrency } from "../../core/pool.js";
import type {
  NativeTransferOutcome,
  ObjectStore,
  StorageTransferPath,
  TransferConfig,
  TransferLogger,
} from "../../core/types.js";

/**
 * Service account key fields the SDK needs for inline credentials
 */
export interface GcsServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

/**
 * GCS object store configuration
 */
export interface GcsObjectStoreConfig extends TransferConfig {
  /** Google Cloud project ID */
  projectId?: string;

  /** Path to a service account key file */
  keyFilename?: string;

  /** Inline service account credentials */
  credentials?: GcsServiceAccountCredentials;

  /** Custom API endpoint (emulators such as fake-gcs-server) */
  apiEndpoint?: string;

  /** Parallel deletes when emptying a bucket (default: 50) */
  deleteConcurrency?: number;

  /** Pre-built client (takes precedence over the connection options) */
  client?: Storage;
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
 * HTTP status carried by GCS ApiError instances
 */
function errorCode(error: unknown): number | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

/**
 * Google Cloud Storage ObjectStore implementation
 */
export class GcsObjectStore implements ObjectStore {
  readonly provider = "gcs";

  private readonly storage: Storage;
  private readonly deleteConcurrency: number;
  private readonly logger: TransferLogger;

  constructor(config: GcsObjectStoreConfig = {}) {
    this.deleteConcurrency = config.deleteConcurrency ?? 50;
    this.logger = config.logger ?? noopLogger;

    if (config.client) {
      this.storage = config.client;
    } else {
      const options: StorageOptions = {
        projectId: config.projectId,
        apiEndpoint: config.apiEndpoint,
      };
      if (config.keyFilename) {
        options.keyFilename = config.keyFilename;
      } else if (config.credentials) {
        options.credentials = config.credentials;
      }
      this.storage = new Storage(options);
    }

    this.logger.debug(
      { projectId: config.projectId, apiEndpoint: config.apiEndpoint },
      "GcsObjectStore initialized",
    );
  }

  // ---- Containers ----

  async createContainer(container: string): Promise<boolean> {
    try {
      await this.storage.createBucket(container);
      this.logger.debug({ bucket: container }, "Bucket created");
      return true;
    } catch (error) {
      if (errorCode(error) === 409) {
        return false;
      }
      throw error;
    }
  }

  async deleteContainer(container: string): Promise<void> {
    try {
      await this.storage.bucket(container).delete();
    } catch (error) {
      throw this.mapContainerError(container, error);
    }
  }

  // ---- Single-object transfers ----

  async uploadFile(
    container: string,
    localPath: string,
    key: string,
  ): Promise<number> {
    const { size } = await stat(localPath);

    try {
      await this.storage.bucket(container).upload(localPath, { destination: key });
    } catch (error) {
      throw this.mapContainerError(container, error);
    }

    return size;
  }

  async downloadFile(
    container: string,
    key: string,
    localPath: string,
  ): Promise<number> {
    const bucket = this.storage.bucket(container);

    try {
      await bucket.file(key).download({ destination: localPath });
    } catch (error) {
      // A failed download can leave an empty destination file behind
      await rm(localPath, { force: true });
      if (errorCode(error) === 404) {
        const [bucketExists] = await bucket.exists();
        throw bucketExists
          ? new ObjectNotFoundError(container, key, toError(error))
          : new ContainerNotFoundError(container, toError(error));
      }
      throw error;
    }

    const { size } = await stat(localPath);
    return size;
  }

  /**
   * Upload a batch through the SDK's TransferManager
   *
   * Files that cannot be read are reported as failed without being sent.
   * Any SDK error rejects the whole call so the caller can fall back to
   * per-file uploads.
   */
  async uploadMany(
    container: string,
    paths: StorageTransferPath[],
    concurrency: number,
  ): Promise<NativeTransferOutcome[]> {
    const destinations = new Map<string, string>();
    for (const path of paths) {
      if (destinations.has(path.localPath)) {
        throw new TransferError(
          `Local file ${path.localPath} is mapped to more than one key`,
        );
      }
      destinations.set(path.localPath, path.storagePath);
    }

    const outcomes: NativeTransferOutcome[] = await Promise.all(
      paths.map(async (path): Promise<NativeTransferOutcome> => {
        try {
          const { size } = await stat(path.localPath);
          return { status: "succeeded", bytes: size };
        } catch (error) {
          return { status: "failed", error: toError(error) };
        }
      }),
    );

    const readable = paths
      .filter((_, i) => outcomes[i]?.status === "succeeded")
      .map((path) => path.localPath);

    if (readable.length > 0) {
      const manager = new TransferManager(this.storage.bucket(container));
      try {
        await manager.uploadManyFiles(readable, {
          concurrencyLimit: concurrency,
          customDestinationBuilder: (localPath) =>
            destinations.get(localPath) ?? localPath,
        });
      } catch (error) {
        throw this.mapContainerError(container, error);
      }
    }

    this.logger.debug(
      { bucket: container, files: readable.length, concurrency },
      "Transfer manager upload finished",
    );
    return outcomes;
  }

  // ---- Objects ----

  async exists(container: string, key: string): Promise<boolean> {
    const [exists] = await this.storage.bucket(container).file(key).exists();
    return exists;
  }

  async listKeys(container: string, prefix = ""): Promise<string[]> {
    try {
      const [files] = await this.storage
        .bucket(container)
        .getFiles({ prefix: prefix || undefined });
      return files.map((file) => file.name).sort();
    } catch (error) {
      throw this.mapContainerError(container, error);
    }
  }

  async deleteKeys(container: string, keys: string[]): Promise<number> {
    const bucket = this.storage.bucket(container);

    const settled = await runWithConcurrency(
      keys,
      this.deleteConcurrency,
      async (key) => {
        try {
          await bucket.file(key).delete();
          return true;
        } catch (error) {
          if (errorCode(error) === 404) return false;
          throw error;
        }
      },
    );

    let deleted = 0;
    for (const result of settled) {
      if (result.status === "rejected") {
        throw result.reason;
      }
      if (result.value) deleted++;
    }

    this.logger.debug({ bucket: container, deleted }, "Objects deleted");
    return deleted;
  }

  // ---- Lifecycle ----

  async close(): Promise<void> {
    this.logger.debug({}, "GcsObjectStore closed");
  }

  /**
   * Map a 404 on a bucket-level call to ContainerNotFoundError
   */
  private mapContainerError(container: string, error: unknown): unknown {
    if (errorCode(error) === 404) {
      return new ContainerNotFoundError(container, toError(error));
    }
    return error;
  }
}
