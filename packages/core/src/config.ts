/**
 * Configuration Schema
 *
 * Single source of truth for cloudbulk configuration. Environment variables
 * are read, defaulted and validated here; the env-loader has already merged
 * .env into process.env by the time buildConfig runs.
 */

import type { CleanupPolicy } from "./cleanup.js";

export const PROVIDERS = ["s3", "azure", "gcs", "memory"] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface CloudbulkConfig {
  // Runtime context
  nodeEnv: string;
  isProduction: boolean;
  logLevel: string;

  // Transfer defaults
  provider: Provider;
  defaultBucket: string | null;
  concurrency: number;
  verbose: boolean;

  // AWS S3 (or any S3-compatible endpoint)
  s3: {
    endpoint: string | null;
    region: string;
    accessKeyId: string | null;
    secretAccessKey: string | null;
    maxPoolConnections: number;
  };

  // Azure Blob Storage
  azure: {
    connectionString: string | null;
    accountName: string | null;
    accountKey: string | null;
  };

  // Google Cloud Storage
  gcs: {
    projectId: string | null;
    credentialsPath: string | null;
    credentialsJson: string | null;
  };

  // Benchmark cleanup
  cleanup: CleanupPolicy;
}

/**
 * Parse an integer with a default
 */
function int(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a boolean
 */
function bool(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === "true";
}

/**
 * Empty strings count as unset
 */
function optional(value: string | undefined): string | null {
  return value ? value : null;
}

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((provider) => provider === value);
}

/**
 * Parse a provider name
 *
 * @throws Error for names outside PROVIDERS
 */
export function parseProvider(value: string): Provider {
  const normalized = value.trim().toLowerCase();
  if (!isProvider(normalized)) {
    throw new Error(
      `Provider must be one of: ${PROVIDERS.join(", ")}. Got: ${value}`,
    );
  }
  return normalized;
}

/**
 * Build the configuration from environment variables
 */
export function buildConfig(
  env: NodeJS.ProcessEnv = process.env,
): CloudbulkConfig {
  const nodeEnv = env.NODE_ENV || "development";

  return {
    nodeEnv,
    isProduction: nodeEnv === "production",
    logLevel: env.LOG_LEVEL || "info",

    provider: parseProvider(env.CLOUDBULK_PROVIDER || "s3"),
    defaultBucket: optional(env.DEFAULT_BUCKET),
    concurrency: int(env.CLOUDBULK_CONCURRENCY, 50),
    verbose: bool(env.CLOUDBULK_VERBOSE, false),

    s3: {
      endpoint: optional(env.AWS_ENDPOINT_URL),
      region: env.AWS_REGION || env.AWS_DEFAULT_REGION || "us-east-1",
      accessKeyId: optional(env.AWS_ACCESS_KEY_ID),
      secretAccessKey: optional(env.AWS_SECRET_ACCESS_KEY),
      maxPoolConnections: int(env.AWS_MAX_POOL_CONNECTIONS, 300),
    },

    azure: {
      connectionString: optional(env.AZURE_STORAGE_CONNECTION_STRING),
      accountName: optional(env.AZURE_STORAGE_ACCOUNT_NAME),
      accountKey: optional(env.AZURE_STORAGE_ACCOUNT_KEY),
    },

    gcs: {
      projectId: optional(env.GOOGLE_CLOUD_PROJECT_ID),
      credentialsPath: optional(env.GOOGLE_CLOUD_CREDENTIALS_PATH),
      credentialsJson: optional(env.GOOGLE_CLOUD_CREDENTIALS_JSON),
    },

    cleanup: {
      enabled: bool(env.CLEANUP_ENABLED, true),
      keepTestData: bool(env.KEEP_TEST_DATA, false),
      keepBuckets: bool(env.KEEP_BUCKETS, false),
      keepLocalFiles: bool(env.KEEP_LOCAL_FILES, false),
    },
  };
}

/**
 * Validate the configuration for one provider
 *
 * @returns Warnings (e.g., falling back to SDK default credentials)
 * @throws Error listing every problem that prevents the provider from working
 */
export function validateConfig(
  config: CloudbulkConfig,
  provider: Provider = config.provider,
): string[] {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push(
      `CLOUDBULK_CONCURRENCY must be a positive integer. Got: ${config.concurrency}`,
    );
  }

  switch (provider) {
    case "s3": {
      const { accessKeyId, secretAccessKey, maxPoolConnections } = config.s3;
      if (Boolean(accessKeyId) !== Boolean(secretAccessKey)) {
        errors.push(
          "AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together",
        );
      } else if (!accessKeyId) {
        warnings.push(
          "AWS credentials not set; using the SDK default credential chain",
        );
      }
      if (maxPoolConnections < 1) {
        errors.push(
          `AWS_MAX_POOL_CONNECTIONS must be at least 1. Got: ${maxPoolConnections}`,
        );
      }
      break;
    }

    case "azure": {
      const { connectionString, accountName, accountKey } = config.azure;
      if (!connectionString && !(accountName && accountKey)) {
        errors.push(
          "Set AZURE_STORAGE_CONNECTION_STRING, or both AZURE_STORAGE_ACCOUNT_NAME and AZURE_STORAGE_ACCOUNT_KEY",
        );
      }
      if (connectionString && (accountName || accountKey)) {
        warnings.push(
          "AZURE_STORAGE_CONNECTION_STRING takes precedence over the account name and key",
        );
      }
      break;
    }

    case "gcs": {
      const { projectId, credentialsPath, credentialsJson } = config.gcs;
      if (!projectId) {
        errors.push("GOOGLE_CLOUD_PROJECT_ID is required for gcs");
      }
      if (credentialsJson) {
        try {
          parseGcsCredentials(credentialsJson);
        } catch (error) {
          errors.push(
            `GOOGLE_CLOUD_CREDENTIALS_JSON is invalid: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
      } else if (!credentialsPath) {
        warnings.push(
          "Google Cloud credentials not set; using application default credentials",
        );
      }
      break;
    }

    case "memory":
      warnings.push("memory provider keeps objects in process; nothing is persisted");
      break;
  }

  if (errors.length > 0) {
    throw new Error(
      `Configuration validation failed:\n  - ${errors.join("\n  - ")}`,
    );
  }

  return warnings;
}

/**
 * Parse inline service account JSON into the fields the GCS SDK needs
 *
 * @throws Error if the JSON is malformed or lacks client_email / private_key
 */
export function parseGcsCredentials(json: string): {
  client_email: string;
  private_key: string;
} {
  const parsed: unknown = JSON.parse(json);
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "client_email" in parsed &&
    "private_key" in parsed &&
    typeof parsed.client_email === "string" &&
    typeof parsed.private_key === "string"
  ) {
    return {
      client_email: parsed.client_email,
      private_key: parsed.private_key,
    };
  }
  throw new Error("expected an object with client_email and private_key");
}

/**
 * Mask a secret, keeping a short prefix for recognition
 */
function mask(value: string | null): string {
  if (!value) return "(not set)";
  if (value.length <= 8) return "****";
  return `${value.slice(0, 4)}****`;
}

/**
 * Get a summary of the config for display (secrets masked)
 */
export function getConfigSummary(
  config: CloudbulkConfig,
): Record<string, string | number | boolean> {
  return {
    nodeEnv: config.nodeEnv,
    logLevel: config.logLevel,
    provider: config.provider,
    defaultBucket: config.defaultBucket ?? "(not set)",
    concurrency: config.concurrency,
    verbose: config.verbose,
    s3Endpoint: config.s3.endpoint ?? "(AWS)",
    s3Region: config.s3.region,
    s3AccessKeyId: mask(config.s3.accessKeyId),
    s3SecretAccessKey: config.s3.secretAccessKey ? "[REDACTED]" : "(not set)",
    s3MaxPoolConnections: config.s3.maxPoolConnections,
    azureConnectionString: config.azure.connectionString
      ? "[REDACTED]"
      : "(not set)",
    azureAccountName: config.azure.accountName ?? "(not set)",
    azureAccountKey: config.azure.accountKey ? "[REDACTED]" : "(not set)",
    gcsProjectId: config.gcs.projectId ?? "(not set)",
    gcsCredentialsPath: config.gcs.credentialsPath ?? "(not set)",
    gcsCredentialsJson: config.gcs.credentialsJson ? "[REDACTED]" : "(not set)",
    cleanupEnabled: config.cleanup.enabled,
    keepTestData: config.cleanup.keepTestData,
    keepBuckets: config.cleanup.keepBuckets,
    keepLocalFiles: config.cleanup.keepLocalFiles,
  };
}
