import chalk from "chalk";

import { SynthError } from "../lib/errors.js";

import type { ReadmeMetadata } from "../metadata/schema/index.js";

/**
 * Release level colors for terminal output, matching the stability badge
 */
const RELEASE_LEVEL_COLORS = {
  ga: chalk.green,
  beta: chalk.yellow,
  alpha: chalk.magenta,
  unknown: chalk.red,
};

/**
 * Issues attached to a validation or config error, if any
 */
function errorIssues(error: Error): string[] {
  if (!(error instanceof SynthError)) {
    return [];
  }
  const issues = error.context?.["issues"];
  return Array.isArray(issues) ? issues.map((issue) => String(issue)) : [];
}

/**
 * Format an error for terminal output, one line per validation issue
 */
export function formatError(error: Error): string {
  const lines = [chalk.red(`Error: ${error.message}`)];
  for (const issue of errorIssues(error)) {
    lines.push(chalk.gray(`  - ${issue}`));
  }
  return lines.join("\n");
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}

/**
 * Summarize what went into a rendered README
 */
export function formatRenderSummary(metadata: ReadmeMetadata, outputPath: string): string {
  const color = RELEASE_LEVEL_COLORS[metadata.repo.release_level];
  const lines = [
    formatSuccess(`Wrote ${outputPath}`),
    `  ${chalk.bold(metadata.repo.name_pretty)} ${chalk.gray(metadata.repo.distribution_name)}`,
    `  release level: ${color(metadata.repo.release_level)}`,
    `  version: ${metadata.latest_version} (BOM ${metadata.latest_bom_version})`,
    `  samples: ${metadata.samples.length}`,
  ];
  if (metadata.repo.transport) {
    lines.push(`  transport: ${metadata.repo.transport}`);
  }
  return lines.join("\n");
}

/**
 * Format metadata as pretty-printed JSON
 */
export function formatMetadataJson(metadata: ReadmeMetadata): string {
  return JSON.stringify(metadata, null, 2);
}
