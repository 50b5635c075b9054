import { getRuntime } from "../../runtime.js";
import { colors, icons } from "../../ui/colors.js";
import { withBulkTransfer } from "./with-store.js";

/**
 * Exit code 0 when the object exists, 1 otherwise
 */
export async function existsCommand(
  container: string,
  key: string,
): Promise<void> {
  await withBulkTransfer(`check ${container}/${key}`, async (bulk) => {
    const found = await bulk.exists(container, key);

    if (getRuntime().settings.json) {
      console.log(JSON.stringify({ container, key, exists: found }));
    } else if (found) {
      console.log(colors.success(`${icons.success} ${container}/${key} exists`));
    } else {
      console.log(colors.warning(`${icons.warning} ${container}/${key} not found`));
    }

    if (!found) {
      process.exitCode = 1;
    }
  });
}
