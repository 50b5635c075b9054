/**
 * CSV and JSON export of benchmark results
 */

import { writeFile } from "node:fs/promises";
import type { BenchmarkResult } from "./runner.js";

const CSV_HEADER = [
  "Provider",
  "Concurrency",
  "Num Files",
  "Total Size (bytes)",
  "Iterations",
  "Upload Time (s)",
  "Upload Speed (MB/s)",
  "Download Time (s)",
  "Download Speed (MB/s)",
  "Files per Second",
  "Speedup",
  "Improvement (%)",
  "Errors",
];

/**
 * Quote a CSV field when it contains a comma, quote or newline
 */
export function csvField(value: string | number): string {
  const text = String(value);
  if (/[",\n\r]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

function seconds(ms: number | undefined): string {
  return ms === undefined ? "" : (ms / 1000).toFixed(3);
}

function speed(mbps: number | undefined): string {
  return mbps === undefined ? "" : mbps.toFixed(2);
}

function ratio(value: number | null): string {
  return value === null ? "" : value.toFixed(2);
}

function percent(value: number | null): string {
  return value === null ? "" : value.toFixed(1);
}

/**
 * Render results as CSV, one row per target
 */
export function toCsv(results: BenchmarkResult[]): string {
  const rows = results.map((result) =>
    [
      result.label,
      result.concurrency,
      result.files,
      result.bytes,
      result.iterations,
      seconds(result.upload?.meanMs),
      speed(result.upload?.mbps),
      seconds(result.download?.meanMs),
      speed(result.download?.mbps),
      speed(result.upload?.filesPerSecond),
      ratio(result.speedup),
      percent(result.improvementPct),
      result.errors.join("; "),
    ]
      .map(csvField)
      .join(","),
  );

  return `${[CSV_HEADER.join(","), ...rows].join("\n")}\n`;
}

export async function writeCsvReport(
  path: string,
  results: BenchmarkResult[],
): Promise<void> {
  await writeFile(path, toCsv(results), "utf8");
}

export async function writeJsonReport(
  path: string,
  results: BenchmarkResult[],
): Promise<void> {
  await writeFile(path, `${JSON.stringify(results, null, 2)}\n`, "utf8");
}
