import chalk from "chalk";

type ChalkFunction = typeof chalk;

// Color scheme for different elements
export const colors = {
  // Status colors
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,

  // UI elements
  header: chalk.cyan.bold,
  subheader: chalk.cyan,
  emphasis: chalk.bold,
  dim: chalk.gray,

  // Providers
  provider: {
    s3: chalk.yellow,
    azure: chalk.blue,
    gcs: chalk.green,
    "gcs-transfer-manager": chalk.greenBright,
    memory: chalk.magenta,
  } satisfies Record<string, ChalkFunction>,
};

// Status icons
export const icons = {
  success: "✅",
  error: "❌",
  warning: "⚠️",

  bucket: "🪣",
  stopwatch: "⏱️",
  broom: "🧹",
  gear: "⚙️",
};

export function formatProvider(provider: string): string {
  const entries: [string, ChalkFunction][] = Object.entries(colors.provider);
  const colorFn = entries.find(([name]) => name === provider)?.[1] ?? chalk.white;
  return colorFn(provider);
}

export function formatTransferStatus(failed: number): string {
  return failed === 0
    ? colors.success(`${icons.success} OK`)
    : colors.error(`${icons.error} ${failed} FAILED`);
}

export function truncateString(str: string | undefined, maxLength = 60): string {
  if (!str) return "";
  if (str.length <= maxLength) return str;
  return `${str.substring(0, maxLength - 3)}...`;
}
