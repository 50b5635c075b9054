import { resolve } from "node:path";
import type { CommandOptions } from "../../types/index.js";
import { runTransfer } from "./run.js";

export async function uploadCommand(
  container: string,
  localDir: string,
  storageDir: string | undefined,
  options: CommandOptions,
): Promise<void> {
  const source = resolve(localDir);
  await runTransfer(
    `Uploading ${source} to ${container}/${storageDir ?? ""}`,
    container,
    (bulk, transferOptions) =>
      bulk.uploadDirectory(container, source, storageDir ?? "", transferOptions),
    options.transferManager,
  );
}
