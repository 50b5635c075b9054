import { getRuntime } from "../../runtime.js";
import { colors, icons } from "../../ui/colors.js";
import { withBulkTransfer } from "./with-store.js";

export async function listCommand(
  container: string,
  prefix: string | undefined,
): Promise<void> {
  await withBulkTransfer(`list ${container}`, async (bulk) => {
    const keys = await bulk.list(container, prefix ?? "");

    if (getRuntime().settings.json) {
      console.log(JSON.stringify({ container, prefix: prefix ?? "", keys }, null, 2));
      return;
    }

    if (keys.length === 0) {
      console.log(colors.warning(`${icons.warning} No objects found`));
      return;
    }

    for (const key of keys) {
      console.log(key);
    }
    console.log(colors.dim(`\n${keys.length} object(s)`));
  });
}
