/**
 * Transfer command registration
 */

import type { Command } from "commander";
import { downloadCommand } from "./download.js";
import { getCommand, putCommand } from "./pairs.js";
import { uploadCommand } from "./upload.js";

export function registerTransferCommands(program: Command): void {
  program
    .command("upload <container> <localDir> [storageDir]")
    .alias("up")
    .description("Upload a directory, preserving its structure")
    .option(
      "--transfer-manager",
      "Use the provider's native bulk upload when it has one (gcs)",
    )
    .action(uploadCommand);

  program
    .command("download <container> <storageDir> <localDir>")
    .alias("down")
    .description("Download every object under a storage directory")
    .action(downloadCommand);

  program
    .command("put <container> <pairs...>")
    .description("Upload explicit local=remote pairs")
    .option(
      "--transfer-manager",
      "Use the provider's native bulk upload when it has one (gcs)",
    )
    .action(putCommand);

  program
    .command("get <container> <pairs...>")
    .description("Download explicit remote=local pairs")
    .action(getCommand);
}
