const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Format a byte count with a binary unit (1 KB = 1024 B)
 *
 * @example
 * formatBytes(1536) // => '1.5 KB'
 */
export function formatBytes(bytes: number, decimals = 1): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";

  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0
    ? `${bytes} B`
    : `${value.toFixed(decimals)} ${BYTE_UNITS[unit]}`;
}

/**
 * Format a duration in milliseconds
 *
 * @example
 * formatDuration(850)    // => '850ms'
 * formatDuration(12_500) // => '12.50s'
 * formatDuration(95_000) // => '1m 35s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Throughput in MB/s (1 MB = 1024 * 1024 B); 0 for a zero duration
 */
export function throughputMBps(bytes: number, durationMs: number): number {
  if (durationMs <= 0) return 0;
  return bytes / (1024 * 1024) / (durationMs / 1000);
}

/**
 * Files per second; 0 for a zero duration
 */
export function filesPerSecond(files: number, durationMs: number): number {
  if (durationMs <= 0) return 0;
  return files / (durationMs / 1000);
}

/**
 * Parse a size such as '512', '64KB', '1.5MB' or '2GB' into bytes
 *
 * @throws Error for anything else
 */
export function parseSize(value: string): number {
  const match = /^\s*(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?\s*$/i.exec(value);
  if (!match) {
    throw new Error(`Invalid size: ${value}`);
  }
  const amount = Number(match[1]);
  const unit = (match[2] ?? "b").toLowerCase();
  const multiplier =
    unit === "gb" ? 1024 ** 3 : unit === "mb" ? 1024 ** 2 : unit === "kb" ? 1024 : 1;
  return Math.round(amount * multiplier);
}
