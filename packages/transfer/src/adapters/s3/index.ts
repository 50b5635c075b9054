/**
 * S3-compatible object store adapter
 *
 * Wraps @aws-sdk/client-s3. Multipart uploads, retries and connection
 * pooling are left to the SDK (`Upload` from @aws-sdk/lib-storage handles
 * part splitting).
 */

import { createReadStream, createWriteStream } from "node:fs";
import { rm, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import {
  BucketLocationConstraint,
  CreateBucketCommand,
  type CreateBucketCommandInput,
  DeleteBucketCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import {
  ContainerNotFoundError,
  ObjectNotFoundError,
  TransferError,
} from "../../core/errors.js";
import type {
  ObjectStore,
  TransferConfig,
  TransferLogger,
} from "../../core/types.js";

/** DeleteObjects accepts at most this many keys per request */
const DELETE_BATCH_SIZE = 1000;

/**
 * S3 object store configuration
 */
export interface S3ObjectStoreConfig extends TransferConfig {
  /** AWS region (default: 'us-east-1') */
  region?: string;

  /** Endpoint for S3-compatible services (MinIO, R2, etc.) */
  endpoint?: string;

  /** Path-style addressing (default: true when an endpoint is set) */
  forcePathStyle?: boolean;

  /** AWS credentials (uses the SDK default chain if not provided) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };

  /** Socket pool size handed to the SDK's HTTP handler (default: 300) */
  maxSockets?: number;

  /** Multipart part size in bytes for large uploads (SDK default if unset) */
  partSize?: number;

  /** Parts uploaded in parallel per object (SDK default if unset) */
  queueSize?: number;

  /** Pre-built client (takes precedence over the connection options) */
  client?: S3Client;
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

function isS3Error(error: unknown, name: string): error is S3ServiceException {
  return error instanceof S3ServiceException && error.name === name;
}

function isNotFound(error: unknown): error is S3ServiceException {
  if (!(error instanceof S3ServiceException)) return false;
  return (
    error.name === "NotFound" ||
    error.name === "NoSuchKey" ||
    error.$metadata?.httpStatusCode === 404
  );
}

/**
 * S3 ObjectStore implementation
 */
export class S3ObjectStore implements ObjectStore {
  readonly provider = "s3";

  private readonly client: S3Client;
  private readonly region: string;
  private readonly partSize?: number;
  private readonly queueSize?: number;
  private readonly logger: TransferLogger;

  constructor(config: S3ObjectStoreConfig = {}) {
    this.region = config.region ?? "us-east-1";
    this.partSize = config.partSize;
    this.queueSize = config.queueSize;
    this.logger = config.logger ?? noopLogger;

    const maxSockets = config.maxSockets ?? 300;
    this.client =
      config.client ??
      new S3Client({
        region: this.region,
        endpoint: config.endpoint,
        forcePathStyle: config.forcePathStyle ?? config.endpoint !== undefined,
        credentials: config.credentials,
        requestHandler: {
          httpAgent: { keepAlive: true, maxSockets },
          httpsAgent: { keepAlive: true, maxSockets },
        },
      });

    this.logger.debug(
      { region: this.region, endpoint: config.endpoint, maxSockets },
      "S3ObjectStore initialized",
    );
  }

  // ---- Containers ----

  async createContainer(container: string): Promise<boolean> {
    const input: CreateBucketCommandInput = { Bucket: container };
    // us-east-1 and unknown regions (MinIO and friends) take no constraint
    const locationConstraint = Object.values(BucketLocationConstraint).find(
      (constraint) => constraint === this.region,
    );
    if (locationConstraint && this.region !== "us-east-1") {
      input.CreateBucketConfiguration = {
        LocationConstraint: locationConstraint,
      };
    }

    try {
      await this.client.send(new CreateBucketCommand(input));
      this.logger.debug({ bucket: container }, "Bucket created");
      return true;
    } catch (error) {
      if (isS3Error(error, "BucketAlreadyOwnedByYou")) {
        return false;
      }
      throw error;
    }
  }

  async deleteContainer(container: string): Promise<void> {
    try {
      await this.client.send(new DeleteBucketCommand({ Bucket: container }));
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

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: container,
        Key: key,
        Body: createReadStream(localPath),
      },
      partSize: this.partSize,
      queueSize: this.queueSize,
    });

    try {
      await upload.done();
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
    let body: unknown;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: container, Key: key }),
      );
      body = response.Body;
    } catch (error) {
      if (isS3Error(error, "NoSuchBucket")) {
        throw new ContainerNotFoundError(container, error);
      }
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(container, key, error);
      }
      throw error;
    }

    if (!(body instanceof Readable)) {
      throw new TransferError(
        `Unexpected response body for ${container}/${key}`,
      );
    }

    try {
      await pipeline(body, createWriteStream(localPath));
    } catch (error) {
      // Drop the partial file
      await rm(localPath, { force: true });
      throw error;
    }

    const { size } = await stat(localPath);
    return size;
  }

  // ---- Objects ----

  async exists(container: string, key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: container, Key: key }),
      );
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async listKeys(container: string, prefix = ""): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: container,
            Prefix: prefix || undefined,
            ContinuationToken: continuationToken,
          }),
        );

        for (const object of page.Contents ?? []) {
          if (object.Key) keys.push(object.Key);
        }
        continuationToken = page.IsTruncated
          ? page.NextContinuationToken
          : undefined;
      } while (continuationToken);
    } catch (error) {
      throw this.mapContainerError(container, error);
    }

    return keys.sort();
  }

  async deleteKeys(container: string, keys: string[]): Promise<number> {
    let deleted = 0;

    for (let i = 0; i < keys.length; i += DELETE_BATCH_SIZE) {
      const batch = keys.slice(i, i + DELETE_BATCH_SIZE);

      let errors: { Key?: string; Message?: string }[];
      try {
        const response = await this.client.send(
          new DeleteObjectsCommand({
            Bucket: container,
            Delete: {
              Objects: batch.map((Key) => ({ Key })),
              Quiet: true,
            },
          }),
        );
        errors = response.Errors ?? [];
      } catch (error) {
        throw this.mapContainerError(container, error);
      }

      if (errors.length > 0) {
        const first = errors[0];
        throw new TransferError(
          `Failed to delete ${errors.length} objects from ${container}: ${first?.Key ?? "?"} (${first?.Message ?? "unknown error"})`,
        );
      }
      deleted += batch.length;
    }

    this.logger.debug({ bucket: container, deleted }, "Objects deleted");
    return deleted;
  }

  // ---- Lifecycle ----

  async close(): Promise<void> {
    this.client.destroy();
    this.logger.debug({}, "S3ObjectStore closed");
  }

  /**
   * Map NoSuchBucket to ContainerNotFoundError, pass everything else through
   */
  private mapContainerError(container: string, error: unknown): unknown {
    if (isS3Error(error, "NoSuchBucket")) {
      return new ContainerNotFoundError(container, error);
    }
    return error;
  }
}
