/**
 * Stats Module
 * Displays the batch summary from the manifest
 */

import chalk from "chalk";
import type { BatchContext, Manifest, ManifestItem } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

export function stats(ctx: BatchContext): void {
  const { result, archivePath, verbose, startTime } = ctx;
  if (!result) return;

  const { manifest } = result;
  const { summary } = manifest;
  const duration = Date.now() - startTime.getTime();

  console.log("");

  const statusIcon =
    summary.succeeded === 0 && summary.total > 0
      ? chalk.red("✖")
      : summary.failed > 0 || summary.skipped > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold("Batch Complete")} ${chalk.dim("·")} ${chalk.dim(`→ ${manifest.targetFormat}`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(duration))}`,
  );

  displayItemsSection(manifest);

  if (archivePath) {
    console.log(sectionHeader("Output"));
    console.log(statRow(chalk.cyan("◉"), "Archive", archivePath, chalk.cyan));
  }

  displayIssuesSection(manifest.items, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayItemsSection(manifest: Manifest): void {
  const { summary } = manifest;
  console.log(sectionHeader("Items"));
  console.log(`   ${progressBar(summary.succeeded, summary.total)}`);

  console.log(statRow(chalk.green("◉"), "Converted", summary.succeeded, chalk.green));

  if (summary.skipped > 0) {
    console.log(statRow(chalk.yellow("◉"), "Skipped", summary.skipped, chalk.yellow));
  }

  if (summary.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failed, chalk.red));
  }
}

function displayIssuesSection(items: ManifestItem[], verbose?: boolean): void {
  const issues = items.filter((item) => item.status !== "success");
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  const shown = verbose ? issues : issues.slice(0, 5);
  for (const item of shown) {
    const kind = item.error?.kind ?? "Unknown";
    const color = item.status === "skipped" ? chalk.yellow : chalk.red;
    console.log(`      ${chalk.dim("·")} ${item.name} ${color(kind)}`);
    if (verbose && item.error) {
      console.log(`        ${chalk.dim(item.error.message)}`);
    }
  }
  if (shown.length < issues.length) {
    console.log(`      ${chalk.dim(`  +${issues.length - shown.length} more`)}`);
  }
}
