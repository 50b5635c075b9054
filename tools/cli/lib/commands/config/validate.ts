import { validateConfig } from "@cloudbulk/core";
import { getRuntime } from "../../runtime.js";
import { colors, formatProvider, icons } from "../../ui/colors.js";
import { createIssuesTable } from "../../ui/tables.js";

interface ValidationIssue {
  type: "error" | "warning";
  message: string;
}

/**
 * Split a validation failure into one issue per listed problem
 */
export function issuesFromError(error: unknown): ValidationIssue[] {
  const message = error instanceof Error ? error.message : String(error);
  const listed = message
    .split("\n")
    .filter((line) => line.startsWith("  - "))
    .map((line) => line.slice(4));
  const problems = listed.length > 0 ? listed : [message];
  return problems.map(
    (problem): ValidationIssue => ({ type: "error", message: problem }),
  );
}

export async function validateCommand(): Promise<void> {
  const { config, settings } = getRuntime();
  const provider = settings.provider;

  let issues: ValidationIssue[];
  let valid: boolean;
  try {
    issues = validateConfig(config, provider).map(
      (warning): ValidationIssue => ({ type: "warning", message: warning }),
    );
    valid = true;
  } catch (error) {
    issues = issuesFromError(error);
    valid = false;
  }

  if (settings.json) {
    console.log(JSON.stringify({ provider, valid, issues }, null, 2));
  } else {
    console.log(
      colors.header(
        `${icons.gear} Validating configuration for ${formatProvider(provider)}\n`,
      ),
    );
    if (valid) {
      console.log(colors.success(`${icons.success} Configuration is valid!`));
      if (issues.length > 0) {
        console.log(colors.subheader("\nWarnings:"));
        console.log(createIssuesTable(issues));
      }
    } else {
      console.log(colors.error(`${icons.error} Configuration has issues:\n`));
      console.log(createIssuesTable(issues));
    }
  }

  if (!valid) {
    process.exitCode = 1;
  }
}
