import { type BulkTransfer, toError } from "@cloudbulk/transfer";
import { openBulkTransfer } from "../../runtime.js";
import { colors, icons } from "../../ui/colors.js";

/**
 * Open a BulkTransfer for one command, report failures and close it
 */
export async function withBulkTransfer(
  action: string,
  fn: (bulk: BulkTransfer) => Promise<void>,
): Promise<void> {
  let bulk: BulkTransfer | null = null;
  try {
    bulk = openBulkTransfer().bulk;
    await fn(bulk);
  } catch (error) {
    console.log(
      colors.error(`${icons.error} Failed to ${action}: ${toError(error).message}`),
    );
    process.exitCode = 1;
  } finally {
    await bulk?.close();
  }
}
