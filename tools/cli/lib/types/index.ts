/**
 * Type definitions for the cloudbulk CLI
 */

import type { Provider } from "@cloudbulk/core";

/**
 * Global options defined on the root program
 */
export interface GlobalOptions {
  provider?: string;
  concurrency?: string;
  verbose?: boolean;
  json?: boolean;
}

/**
 * Command options passed to CLI commands
 */
export interface CommandOptions {
  transferManager?: boolean;
}

/**
 * Options for the bench command
 */
export interface BenchOptions {
  files: string;
  size: string;
  iterations: string;
  concurrencyLevels?: string;
  baseline?: boolean;
  providers?: string;
  bucket?: string;
  transferManager?: boolean;
  download: boolean;
  csv?: string;
  jsonOut?: string;
  cleanup: boolean;
  keepData?: boolean;
  keepBuckets?: boolean;
  keepFiles?: boolean;
}

/**
 * Resolved settings for one invocation
 */
export interface RuntimeSettings {
  provider: Provider;
  concurrency: number;
  verbose: boolean;
  json: boolean;
}
