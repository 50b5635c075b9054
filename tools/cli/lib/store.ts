/**
 * ObjectStore factory for the configured providers
 */

import {
  type CloudbulkConfig,
  type Provider,
  parseGcsCredentials,
} from "@cloudbulk/core";
import type { ObjectStore, TransferLogger } from "@cloudbulk/transfer";
import { AzureBlobObjectStore } from "@cloudbulk/transfer/azure";
import { GcsObjectStore } from "@cloudbulk/transfer/gcs";
import { MemoryObjectStore } from "@cloudbulk/transfer/memory";
import { S3ObjectStore } from "@cloudbulk/transfer/s3";

/**
 * Build the adapter for a provider from configuration
 */
export function createObjectStore(
  provider: Provider,
  config: CloudbulkConfig,
  logger?: TransferLogger,
): ObjectStore {
  switch (provider) {
    case "s3": {
      const { endpoint, region, accessKeyId, secretAccessKey } = config.s3;
      return new S3ObjectStore({
        region,
        endpoint: endpoint ?? undefined,
        credentials:
          accessKeyId && secretAccessKey
            ? { accessKeyId, secretAccessKey }
            : undefined,
        maxSockets: config.s3.maxPoolConnections,
        logger,
      });
    }

    case "azure":
      return new AzureBlobObjectStore({
        connectionString: config.azure.connectionString ?? undefined,
        accountName: config.azure.accountName ?? undefined,
        accountKey: config.azure.accountKey ?? undefined,
        logger,
      });

    case "gcs": {
      const { projectId, credentialsPath, credentialsJson } = config.gcs;
      return new GcsObjectStore({
        projectId: projectId ?? undefined,
        keyFilename: credentialsPath ?? undefined,
        credentials: credentialsJson
          ? parseGcsCredentials(credentialsJson)
          : undefined,
        logger,
      });
    }

    case "memory":
      return new MemoryObjectStore({ logger });
  }
}
