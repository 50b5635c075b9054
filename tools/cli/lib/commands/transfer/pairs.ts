/**
 * put / get: explicit lists of transfer pairs
 */

import type { StorageTransferPath } from "@cloudbulk/transfer";
import { parsePairs } from "../../pairs.js";
import type { CommandOptions } from "../../types/index.js";
import { colors, icons } from "../../ui/colors.js";
import { runTransfer } from "./run.js";

function parseOrExit(
  pairs: string[],
  direction: "upload" | "download",
): StorageTransferPath[] | null {
  try {
    return parsePairs(pairs, direction);
  } catch (error) {
    console.log(
      colors.error(
        `${icons.error} ${error instanceof Error ? error.message : String(error)}`,
      ),
    );
    process.exitCode = 1;
    return null;
  }
}

export async function putCommand(
  container: string,
  pairs: string[],
  options: CommandOptions,
): Promise<void> {
  const paths = parseOrExit(pairs, "upload");
  if (!paths) return;

  await runTransfer(
    `Uploading ${paths.length} file(s) to ${container}`,
    container,
    (bulk, transferOptions) => bulk.upload(container, paths, transferOptions),
    options.transferManager,
  );
}

export async function getCommand(
  container: string,
  pairs: string[],
): Promise<void> {
  const paths = parseOrExit(pairs, "download");
  if (!paths) return;

  await runTransfer(
    `Downloading ${paths.length} object(s) from ${container}`,
    container,
    (bulk, options) => bulk.download(container, paths, options),
  );
}
