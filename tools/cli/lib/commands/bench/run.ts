import {
  applyCleanupFlags,
  formatBytes,
  generateBatchId,
  generateContainerName,
  getCleanupMessage,
  parseSize,
  type Provider,
  shouldCleanup,
  validateConfig,
} from "@cloudbulk/core";
import { runWithBatchId } from "@cloudbulk/logger";
import { toError } from "@cloudbulk/transfer";
import ora from "ora";
import { writeCsvReport, writeJsonReport } from "../../bench/export.js";
import {
  createTestFiles,
  removeTestFiles,
  type TestFiles,
} from "../../bench/fixtures.js";
import { bestConcurrency, compareToBaseline } from "../../bench/compare.js";
import { type BenchmarkResult, runBenchmark } from "../../bench/runner.js";
import {
  parseConcurrencyLevels,
  parseProviderList,
  planTargets,
} from "../../bench/targets.js";
import { getRuntime } from "../../runtime.js";
import { createObjectStore } from "../../store.js";
import type { BenchOptions } from "../../types/index.js";
import { colors, formatProvider, icons } from "../../ui/colors.js";
import { createBenchmarkTable } from "../../ui/tables.js";

function positiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--${name} must be a positive integer, got ${value}`);
  }
  return parsed;
}

export async function benchCommand(options: BenchOptions): Promise<void> {
  try {
    await runWithBatchId(generateBatchId(), () => runBench(options));
  } catch (error) {
    console.log(
      colors.error(`${icons.error} Benchmark failed: ${toError(error).message}`),
    );
    process.exitCode = 1;
  }
}

async function runBench(options: BenchOptions): Promise<void> {
  const { config, settings, createChildLogger } = getRuntime();
  const logger = createChildLogger("bench");

  const fileCount = positiveInt(options.files, "files");
  const fileSize = parseSize(options.size);
  const iterations = positiveInt(options.iterations, "iterations");
  const levels = parseConcurrencyLevels(
    options.concurrencyLevels ?? String(settings.concurrency),
    options.baseline ?? false,
  );
  const requested = options.providers
    ? parseProviderList(options.providers)
    : [settings.provider];
  const container =
    options.bucket ?? config.defaultBucket ?? generateContainerName();
  const policy = applyCleanupFlags(config.cleanup, options);

  // Skip providers that cannot work with the current environment
  const providers: Provider[] = [];
  for (const provider of requested) {
    try {
      for (const warning of validateConfig(config, provider)) {
        logger.warn({ provider }, warning);
      }
      providers.push(provider);
    } catch (error) {
      console.log(
        colors.warning(
          `${icons.warning} Skipping ${provider}: ${toError(error).message}`,
        ),
      );
    }
  }
  if (providers.length === 0) {
    throw new Error("No provider is configured for benchmarking");
  }

  const targets = planTargets(
    providers,
    {
      transferManager: options.transferManager ?? false,
      download: options.download,
    },
    (provider) => createObjectStore(provider, config, createChildLogger(provider)),
  );

  if (!settings.json) {
    console.log(colors.header(`${icons.stopwatch} Bulk Transfer Benchmark\n`));
    console.log(`  Providers:   ${targets.map((t) => formatProvider(t.label)).join(", ")}`);
    console.log(`  Container:   ${container}`);
    console.log(
      `  Files:       ${fileCount} x ${formatBytes(fileSize)} (${formatBytes(fileCount * fileSize)})`,
    );
    console.log(`  Iterations:  ${iterations}`);
    console.log(`  Concurrency: ${levels.join(", ")}`);
    console.log(colors.dim(`  ${getCleanupMessage(policy)}\n`));
  }

  let testFiles: TestFiles | null = null;
  const runs: BenchmarkResult[] = [];

  try {
    testFiles = await createTestFiles(fileCount, fileSize);
    logger.info({ dir: testFiles.dir, files: fileCount }, "Test files created");

    for (const target of targets) {
      try {
        for (const level of levels) {
          const name = `${formatProvider(target.label)} x${level}`;
          const spinner = settings.json
            ? null
            : ora({ text: `${name}...`, color: "cyan" }).start();

          const result = await runBenchmark(target, {
            container,
            testFiles,
            iterations,
            concurrency: level,
            cleanup: policy,
            logger: createChildLogger(target.label),
            onPhase: (phase) => {
              if (spinner) spinner.text = `${phase} (x${level})`;
            },
          });
          runs.push(result);

          if (result.errors.length === 0) {
            spinner?.succeed(`${name} done`);
          } else {
            spinner?.fail(`${name}: ${colors.error(result.errors.join("; "))}`);
          }
        }
      } finally {
        await target.store.close();
      }
    }
  } finally {
    if (testFiles) {
      if (shouldCleanup(policy, "local_files")) {
        await removeTestFiles(testFiles);
      } else if (!settings.json) {
        console.log(colors.dim(`\nTest files kept in ${testFiles.dir}`));
      }
    }
  }

  const results = compareToBaseline(runs);

  if (options.csv) {
    await writeCsvReport(options.csv, results);
  }
  if (options.jsonOut) {
    await writeJsonReport(options.jsonOut, results);
  }

  if (settings.json) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    console.log(`\n${createBenchmarkTable(results)}`);
    if (levels.length > 1) {
      for (const best of bestConcurrency(results)) {
        const speedup =
          best.speedup === null ? "" : ` (${best.speedup.toFixed(2)}x)`;
        console.log(
          `${icons.stopwatch} Best concurrency for ${formatProvider(best.label)}: ${colors.emphasis(String(best.concurrency))}${speedup}`,
        );
      }
    }
    if (options.csv) {
      console.log(colors.dim(`CSV written to ${options.csv}`));
    }
    if (options.jsonOut) {
      console.log(colors.dim(`JSON written to ${options.jsonOut}`));
    }
  }

  if (results.some((result) => result.errors.length > 0)) {
    process.exitCode = 1;
  }
}
