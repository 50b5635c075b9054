/**
 * Config subcommand registration
 */

import { Command } from "commander";
import { showCommand } from "./show.js";
import { validateCommand } from "./validate.js";

export function registerConfigCommands(program: Command): void {
  const config = new Command("config")
    .description("Show the effective configuration (secrets masked)")
    .alias("cfg")
    .action(showCommand);

  config
    .command("validate")
    .description("Validate the configuration for the selected provider")
    .action(validateCommand);

  program.addCommand(config);
}
