#!/usr/bin/env tsx

import boxen from "boxen";
import chalk from "chalk";
import { Command } from "commander";
import { registerBenchCommands } from "./lib/commands/bench/index.js";
import { registerConfigCommands } from "./lib/commands/config/index.js";
import { registerObjectCommands } from "./lib/commands/objects/index.js";
import { registerTransferCommands } from "./lib/commands/transfer/index.js";
import { initRuntime } from "./lib/runtime.js";
import type { GlobalOptions } from "./lib/types/index.js";

const program = new Command();

const wantsJson = process.argv.includes("--json");

// CLI Header (stderr, so --json output stays parseable)
if (!wantsJson) {
  console.error(
    boxen(chalk.cyan.bold("cloudbulk"), {
      padding: 1,
      margin: 1,
      borderStyle: "round",
      borderColor: "cyan",
    }),
  );
}

program
  .name("cloudbulk")
  .description(
    "cloudbulk - Parallel bulk transfers for S3, Azure Blob Storage and Google Cloud Storage",
  )
  .version("0.1.0")
  .option(
    "-p, --provider <name>",
    "Storage provider: s3, azure, gcs or memory (in-process, nothing persists)",
  )
  .option("-c, --concurrency <n>", "Number of parallel transfers")
  .option("-v, --verbose", "Log every transferred item (debug logging)")
  .option("--json", "Output as JSON");

// Register subcommand groups
registerTransferCommands(program);
registerObjectCommands(program);
registerBenchCommands(program);
registerConfigCommands(program);

// Resolve configuration and logging before any command runs
program.hook("preAction", (thisCommand) => {
  const options: GlobalOptions = thisCommand.opts();
  try {
    initRuntime(options);
  } catch (error) {
    console.log(
      chalk.red(
        `\n  ${error instanceof Error ? error.message : String(error)}\n`,
      ),
    );
    process.exit(1);
  }
});

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.unknownCommand") {
    console.log(chalk.red("\n  Unknown command"));
    console.log(
      chalk.gray("  Run") +
        chalk.cyan(" cloudbulk --help ") +
        chalk.gray("to see available commands\n"),
    );
    process.exit(1);
  }
  if (err.code === "commander.helpDisplayed" || err.code === "commander.help") {
    process.exit(0);
  }
  if (err.code === "commander.version") {
    process.exit(0);
  }
  process.exit(err.exitCode);
});

// Parse command line arguments
await program.parseAsync();
