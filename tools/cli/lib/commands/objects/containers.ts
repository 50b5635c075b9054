/**
 * mb / rb / empty
 */

import { getRuntime } from "../../runtime.js";
import { colors, icons } from "../../ui/colors.js";
import { withBulkTransfer } from "./with-store.js";

function print(json: object, text: string): void {
  console.log(getRuntime().settings.json ? JSON.stringify(json) : text);
}

export async function makeContainerCommand(container: string): Promise<void> {
  await withBulkTransfer(`create ${container}`, async (bulk) => {
    const created = await bulk.createContainer(container);
    print(
      { container, created },
      created
        ? colors.success(`${icons.bucket} Created ${container}`)
        : colors.dim(`${icons.bucket} ${container} already exists`),
    );
  });
}

export async function removeContainerCommand(
  container: string,
  options: { force?: boolean },
): Promise<void> {
  await withBulkTransfer(`remove ${container}`, async (bulk) => {
    const emptied = options.force ? await bulk.emptyContainer(container) : 0;
    await bulk.deleteContainer(container);
    print(
      { container, deleted: true, objectsDeleted: emptied },
      colors.success(`${icons.broom} Removed ${container}`),
    );
  });
}

export async function emptyContainerCommand(container: string): Promise<void> {
  await withBulkTransfer(`empty ${container}`, async (bulk) => {
    const deleted = await bulk.emptyContainer(container);
    print(
      { container, objectsDeleted: deleted },
      colors.success(`${icons.broom} Deleted ${deleted} object(s) from ${container}`),
    );
  });
}
