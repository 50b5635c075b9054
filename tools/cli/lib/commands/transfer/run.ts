/**
 * Shared driver for the transfer commands
 */

import { generateBatchId } from "@cloudbulk/core";
import { runWithBatchId } from "@cloudbulk/logger";
import {
  type BulkTransfer,
  type TransferOptions,
  type TransferReport,
  toError,
} from "@cloudbulk/transfer";
import ora from "ora";
import { getRuntime, openBulkTransfer } from "../../runtime.js";
import { colors, formatProvider, icons } from "../../ui/colors.js";
import { createFailuresTable, createReportTable } from "../../ui/tables.js";

/**
 * Serializable view of a report for --json
 */
export function reportToJson(report: TransferReport) {
  return {
    direction: report.direction,
    container: report.container,
    total: report.total,
    succeeded: report.succeeded,
    failed: report.failed,
    bytes: report.bytes,
    durationMs: report.durationMs,
    failures: report.results.flatMap((result) =>
      result.status === "failed"
        ? [
            {
              localPath: result.path.localPath,
              storagePath: result.path.storagePath,
              error: result.error.message,
            },
          ]
        : [],
    ),
  };
}

/**
 * Run one bulk transfer with a progress spinner and print its report
 *
 * Exits with code 1 when any item failed or the transfer could not start.
 * The memory provider starts empty in every process, so the container is
 * created first there.
 */
export async function runTransfer(
  title: string,
  container: string,
  execute: (
    bulk: BulkTransfer,
    options: TransferOptions,
  ) => Promise<TransferReport>,
  useTransferManager = false,
): Promise<void> {
  const { settings } = getRuntime();
  let bulk: BulkTransfer | null = null;
  const spinner = settings.json
    ? null
    : ora({ text: `${title}...`, color: "cyan" }).start();

  try {
    const opened = openBulkTransfer().bulk;
    bulk = opened;
    if (settings.provider === "memory") {
      await opened.createContainer(container);
    }
    const report = await runWithBatchId(generateBatchId(), () =>
      execute(opened, {
        throwOnError: false,
        useTransferManager,
        onProgress: ({ completed, failed, total }) => {
          if (!spinner) return;
          const failures = failed > 0 ? colors.error(` (${failed} failed)`) : "";
          spinner.text = `${title}... ${completed}/${total}${failures}`;
        },
      }),
    );

    if (settings.json) {
      console.log(JSON.stringify(reportToJson(report), null, 2));
    } else {
      if (report.failed === 0) {
        spinner?.succeed(colors.success(`${title} complete`));
      } else {
        spinner?.fail(colors.error(`${title} finished with failures`));
      }
      console.log(
        colors.dim(`\nProvider: ${formatProvider(settings.provider)}\n`),
      );
      console.log(createReportTable(report));
      if (report.failed > 0) {
        console.log(colors.subheader("\nFailed items:"));
        console.log(createFailuresTable(report));
      }
    }

    if (report.failed > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner?.fail(colors.error(`${title} failed`));
    console.log(
      colors.error(`${icons.error} ${title} failed: ${toError(error).message}`),
    );
    process.exitCode = 1;
  } finally {
    await bulk?.close();
  }
}
