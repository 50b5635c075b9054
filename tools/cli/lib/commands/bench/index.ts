/**
 * Bench command registration
 */

import type { Command } from "commander";
import { benchCommand } from "./run.js";

export function registerBenchCommands(program: Command): void {
  program
    .command("bench")
    .description(
      "Benchmark bulk uploads and downloads across providers",
    )
    .option("--files <n>", "Number of files to generate", "20")
    .option("--size <size>", "Size of each file (e.g. 64KB, 1MB)", "1MB")
    .option("--iterations <n>", "Timed runs per provider", "1")
    .option(
      "--providers <list>",
      "Comma-separated providers to compare (default: --provider)",
    )
    .option(
      "--concurrency-levels <list>",
      "Comma-separated worker counts to sweep, e.g. 1,2,5,10,20,50 (default: --concurrency)",
    )
    .option(
      "--baseline",
      "Add a sequential run (concurrency 1) and report speedups against it",
    )
    .option("--bucket <name>", "Bucket/container to use (default: generated)")
    .option(
      "--transfer-manager",
      "Also benchmark the GCS transfer manager upload path",
    )
    .option("--no-download", "Skip download timings")
    .option("--csv <path>", "Write results as CSV")
    .option("--json-out <path>", "Write results as JSON")
    .option("--no-cleanup", "Keep buckets, data and local files")
    .option("--keep-data", "Keep uploaded objects and their buckets")
    .option("--keep-buckets", "Keep buckets but delete the uploaded objects")
    .option("--keep-files", "Keep the generated local files")
    .action(benchCommand);
}
