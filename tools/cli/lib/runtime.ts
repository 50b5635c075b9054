/**
 * Per-invocation runtime: configuration, logger and resolved global options
 *
 * Set once by the root program's preAction hook, read by every command.
 */

import {
  buildConfig,
  type CloudbulkConfig,
  type Provider,
  parseProvider,
} from "@cloudbulk/core";
import { createLoggerFactory, type Logger } from "@cloudbulk/logger";
import { BulkTransfer, type ObjectStore } from "@cloudbulk/transfer";
import { createObjectStore } from "./store.js";
import type { GlobalOptions, RuntimeSettings } from "./types/index.js";

interface Runtime {
  config: CloudbulkConfig;
  settings: RuntimeSettings;
  logger: Logger;
  createChildLogger: (name: string) => Logger;
}

let runtime: Runtime | null = null;

/**
 * Resolve global options over the environment configuration
 *
 * @throws Error for an unknown provider or a non-positive concurrency
 */
export function resolveSettings(
  options: GlobalOptions,
  config: CloudbulkConfig,
): RuntimeSettings {
  const provider = options.provider
    ? parseProvider(options.provider)
    : config.provider;

  let concurrency = config.concurrency;
  if (options.concurrency !== undefined) {
    concurrency = Number(options.concurrency);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(
        `--concurrency must be a positive integer, got ${options.concurrency}`,
      );
    }
  }

  return {
    provider,
    concurrency,
    verbose: options.verbose ?? config.verbose,
    json: options.json ?? false,
  };
}

/**
 * Initialize the runtime from global options
 */
export function initRuntime(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): Runtime {
  const config = buildConfig(env);
  const settings = resolveSettings(options, config);

  // Logs go to stderr so command output on stdout stays pipeable.
  // Without --verbose only warnings show unless LOG_LEVEL asks for more.
  const level = settings.verbose
    ? "debug"
    : env.LOG_LEVEL
      ? config.logLevel
      : "warn";

  const factory = createLoggerFactory({
    service: "cloudbulk",
    level,
    environment: config.nodeEnv,
    stderr: true,
    messageFormat: "[{module}] {msg}",
  });

  runtime = {
    config,
    settings,
    logger: factory.logger,
    createChildLogger: factory.createChildLogger,
  };
  return runtime;
}

export function getRuntime(): Runtime {
  if (!runtime) {
    throw new Error("CLI runtime not initialized");
  }
  return runtime;
}

/**
 * Open a BulkTransfer over the selected provider
 */
export function openBulkTransfer(provider?: Provider): {
  bulk: BulkTransfer;
  store: ObjectStore;
} {
  const { config, settings, createChildLogger } = getRuntime();
  const selected = provider ?? settings.provider;
  const store = createObjectStore(selected, config, createChildLogger(selected));
  const bulk = new BulkTransfer(store, {
    concurrency: settings.concurrency,
    verbose: settings.verbose,
    logger: createChildLogger("bulk"),
  });
  return { bulk, store };
}
