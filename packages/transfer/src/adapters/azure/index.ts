/**
 * Azure Blob Storage object store adapter
 *
 * Wraps @azure/storage-blob. Block splitting and parallel block uploads for
 * a single blob are handled by the SDK's uploadFile.
 */

import { stat } from "node:fs/promises";
import {
  BlobServiceClient,
  RestError,
  StorageSharedKeyCredential,
} from "@azure/storage-blob";
import {
  ContainerNotFoundError,
  ObjectNotFoundError,
  TransferConfigError,
} from "../../core/errors.js";
import { runWithConcurrency } from "../../core/pool.js";
import type {
  ObjectStore,
  TransferConfig,
  TransferLogger,
} from "../../core/types.js";

/**
 * Azure Blob object store configuration
 *
 * Provide a connection string, or an account name and key.
 */
export interface AzureBlobObjectStoreConfig extends TransferConfig {
  /** Full connection string (DefaultEndpointsProtocol=...;AccountName=...) */
  connectionString?: string;

  /** Storage account name (used with accountKey) */
  accountName?: string;

  /** Storage account key (used with accountName) */
  accountKey?: string;

  /** Blob service URL (default: https://{accountName}.blob.core.windows.net) */
  serviceUrl?: string;

  /** Block size for uploads in bytes (default: 4 MiB) */
  blockSize?: number;

  /** Parallel block uploads per blob (default: 20) */
  maxConcurrency?: number;

  /** Parallel deletes when emptying a container (default: 50) */
  deleteConcurrency?: number;

  /** Pre-built client (takes precedence over the connection options) */
  client?: BlobServiceClient;
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

function isRestError(error: unknown, code: string): error is RestError {
  return error instanceof RestError && error.code === code;
}

/**
 * Build a BlobServiceClient from connection options
 */
function createServiceClient(
  config: AzureBlobObjectStoreConfig,
): BlobServiceClient {
  if (config.connectionString) {
    return BlobServiceClient.fromConnectionString(config.connectionString);
  }

  if (config.accountName && config.accountKey) {
    const credential = new StorageSharedKeyCredential(
      config.accountName,
      config.accountKey,
    );
    return new BlobServiceClient(
      config.serviceUrl ?? `https://${config.accountName}.blob.core.windows.net`,
      credential,
    );
  }

  throw new TransferConfigError(
    "Azure Blob Storage credentials not found. Provide a connection string or an account name and key",
  );
}

/**
 * Azure Blob ObjectStore implementation
 */
export class AzureBlobObjectStore implements ObjectStore {
  readonly provider = "azure";

  private readonly client: BlobServiceClient;
  private readonly blockSize: number;
  private readonly maxConcurrency: number;
  private readonly deleteConcurrency: number;
  private readonly logger: TransferLogger;

  constructor(config: AzureBlobObjectStoreConfig) {
    this.client = config.client ?? createServiceClient(config);
    this.blockSize = config.blockSize ?? 4 * 1024 * 1024;
    this.maxConcurrency = config.maxConcurrency ?? 20;
    this.deleteConcurrency = config.deleteConcurrency ?? 50;
    this.logger = config.logger ?? noopLogger;

    this.logger.debug(
      { accountName: this.client.accountName },
      "AzureBlobObjectStore initialized",
    );
  }

  // ---- Containers ----

  async createContainer(container: string): Promise<boolean> {
    const response = await this.client
      .getContainerClient(container)
      .createIfNotExists();
    this.logger.debug(
      { container, created: response.succeeded },
      "Container ready",
    );
    return response.succeeded;
  }

  async deleteContainer(container: string): Promise<void> {
    try {
      await this.client.getContainerClient(container).delete();
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
    const blob = this.client
      .getContainerClient(container)
      .getBlockBlobClient(key);

    try {
      await blob.uploadFile(localPath, {
        blockSize: this.blockSize,
        concurrency: this.maxConcurrency,
      });
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
    const blob = this.client.getContainerClient(container).getBlobClient(key);

    try {
      await blob.downloadToFile(localPath);
    } catch (error) {
      if (isRestError(error, "BlobNotFound")) {
        throw new ObjectNotFoundError(container, key, error);
      }
      throw this.mapContainerError(container, error);
    }

    const { size } = await stat(localPath);
    return size;
  }

  // ---- Objects ----

  async exists(container: string, key: string): Promise<boolean> {
    return this.client.getContainerClient(container).getBlobClient(key).exists();
  }

  async listKeys(container: string, prefix = ""): Promise<string[]> {
    const keys: string[] = [];
    const containerClient = this.client.getContainerClient(container);

    try {
      for await (const blob of containerClient.listBlobsFlat({
        prefix: prefix || undefined,
      })) {
        keys.push(blob.name);
      }
    } catch (error) {
      throw this.mapContainerError(container, error);
    }

    return keys.sort();
  }

  async deleteKeys(container: string, keys: string[]): Promise<number> {
    const containerClient = this.client.getContainerClient(container);

    const settled = await runWithConcurrency(
      keys,
      this.deleteConcurrency,
      async (key) => {
        const response = await containerClient
          .getBlobClient(key)
          .deleteIfExists();
        return response.succeeded;
      },
    );

    let deleted = 0;
    for (const result of settled) {
      if (result.status === "rejected") {
        throw this.mapContainerError(container, result.reason);
      }
      if (result.value) deleted++;
    }

    this.logger.debug({ container, deleted }, "Blobs deleted");
    return deleted;
  }

  // ---- Lifecycle ----

  async close(): Promise<void> {
    // The SDK keeps no resources that need releasing
    this.logger.debug({}, "AzureBlobObjectStore closed");
  }

  /**
   * Map ContainerNotFound to ContainerNotFoundError, pass everything else through
   */
  private mapContainerError(container: string, error: unknown): unknown {
    if (isRestError(error, "ContainerNotFound")) {
      return new ContainerNotFoundError(container, error);
    }
    return error;
  }
}
