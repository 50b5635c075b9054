import { resolve } from "node:path";
import { runTransfer } from "./run.js";

export async function downloadCommand(
  container: string,
  storageDir: string,
  localDir: string,
): Promise<void> {
  const target = resolve(localDir);
  await runTransfer(
    `Downloading ${container}/${storageDir} to ${target}`,
    container,
    (bulk, options) =>
      bulk.downloadDirectory(container, storageDir, target, options),
  );
}
