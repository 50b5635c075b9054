import { envLoadInfo, getConfigSummary } from "@cloudbulk/core";
import { getRuntime } from "../../runtime.js";
import { colors, icons } from "../../ui/colors.js";
import { createInfoTable } from "../../ui/tables.js";

export async function showCommand(): Promise<void> {
  const { config, settings } = getRuntime();
  const summary = {
    ...getConfigSummary(config),
    provider: settings.provider,
    concurrency: settings.concurrency,
  };

  if (settings.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log(colors.header(`${icons.gear} cloudbulk Configuration\n`));
  console.log(
    colors.dim(
      envLoadInfo.envLoaded
        ? `Loaded ${envLoadInfo.envPath}\n`
        : "No .env file found; using the process environment\n",
    ),
  );
  console.log(createInfoTable(summary));
}
