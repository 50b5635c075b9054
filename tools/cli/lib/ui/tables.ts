import { formatBytes, formatDuration } from "@cloudbulk/core";
import type { TransferReport } from "@cloudbulk/transfer";
import Table from "cli-table3";
import type { BenchmarkResult } from "../bench/runner.js";
import {
  colors,
  formatProvider,
  formatTransferStatus,
  truncateString,
} from "./colors.js";

interface ValidationIssue {
  type: "error" | "warning";
  message: string;
}

const tableStyle = {
  head: [],
  border: ["gray"],
};

/**
 * Summary of one bulk transfer
 */
export function createReportTable(report: TransferReport): string {
  const table = new Table({ style: tableStyle });

  table.push(
    [colors.emphasis("Direction"), report.direction],
    [colors.emphasis("Container"), report.container],
    [colors.emphasis("Files"), String(report.total)],
    [colors.emphasis("Succeeded"), colors.success(String(report.succeeded))],
    [colors.emphasis("Failed"), report.failed > 0 ? colors.error(String(report.failed)) : "0"],
    [colors.emphasis("Bytes"), formatBytes(report.bytes)],
    [colors.emphasis("Duration"), formatDuration(report.durationMs)],
    [colors.emphasis("Status"), formatTransferStatus(report.failed)],
  );

  return table.toString();
}

/**
 * Failed items of a bulk transfer
 */
export function createFailuresTable(report: TransferReport): string {
  const table = new Table({
    head: [
      colors.header("Local Path"),
      colors.header("Storage Path"),
      colors.header("Error"),
    ],
    style: tableStyle,
  });

  for (const result of report.results) {
    if (result.status !== "failed") continue;
    table.push([
      truncateString(result.path.localPath, 40),
      truncateString(result.path.storagePath, 40),
      colors.error(truncateString(result.error.message)),
    ]);
  }

  return table.toString();
}

/**
 * Create a simple key-value table
 */
export function createInfoTable(
  data: Record<string, string | number | boolean>,
): string {
  const table = new Table({ style: tableStyle });

  for (const [key, value] of Object.entries(data)) {
    table.push([colors.emphasis(key), String(value)]);
  }

  return table.toString();
}

export function createIssuesTable(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return colors.success("✅ No issues found");
  }

  const table = new Table({
    head: [colors.header("Type"), colors.header("Issue")],
    style: tableStyle,
  });

  issues.forEach((issue) => {
    const typeColor = issue.type === "error" ? colors.error : colors.warning;
    table.push([typeColor(issue.type.toUpperCase()), issue.message]);
  });

  return table.toString();
}

/**
 * Side-by-side benchmark comparison
 */
/**
 * "3.20x (68.8%)" against the sequential baseline, "-" without one
 */
function formatSpeedup(result: BenchmarkResult): string {
  if (result.speedup === null || result.improvementPct === null) {
    return colors.dim("-");
  }
  return `${result.speedup.toFixed(2)}x (${result.improvementPct.toFixed(1)}%)`;
}

export function createBenchmarkTable(results: BenchmarkResult[]): string {
  const table = new Table({
    head: [
      colors.header("Provider"),
      colors.header("Workers"),
      colors.header("Files"),
      colors.header("Size"),
      colors.header("Upload"),
      colors.header("Upload MB/s"),
      colors.header("Download"),
      colors.header("Download MB/s"),
      colors.header("Files/s"),
      colors.header("Speedup"),
      colors.header("Status"),
    ],
    style: tableStyle,
  });

  for (const result of results) {
    const { upload, download } = result;
    table.push([
      formatProvider(result.label),
      String(result.concurrency),
      String(result.files),
      formatBytes(result.bytes),
      upload ? formatDuration(upload.meanMs) : colors.dim("-"),
      upload ? upload.mbps.toFixed(2) : colors.dim("-"),
      download ? formatDuration(download.meanMs) : colors.dim("-"),
      download ? download.mbps.toFixed(2) : colors.dim("-"),
      upload ? upload.filesPerSecond.toFixed(1) : colors.dim("-"),
      formatSpeedup(result),
      formatTransferStatus(result.errors.length),
    ]);
  }

  return table.toString();
}
