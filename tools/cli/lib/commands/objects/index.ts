/**
 * Object and container command registration
 */

import type { Command } from "commander";
import {
  emptyContainerCommand,
  makeContainerCommand,
  removeContainerCommand,
} from "./containers.js";
import { existsCommand } from "./exists.js";
import { listCommand } from "./list.js";

export function registerObjectCommands(program: Command): void {
  program
    .command("ls <container> [prefix]")
    .alias("list")
    .description("List object keys under a prefix")
    .action(listCommand);

  program
    .command("exists <container> <key>")
    .description("Check whether an object exists (exit code 1 if not)")
    .action(existsCommand);

  program
    .command("mb <container>")
    .description("Create a bucket/container")
    .action(makeContainerCommand);

  program
    .command("rb <container>")
    .description("Remove a bucket/container")
    .option("--force", "Delete every object first")
    .action(removeContainerCommand);

  program
    .command("empty <container>")
    .description("Delete every object in a bucket/container")
    .action(emptyContainerCommand);
}
