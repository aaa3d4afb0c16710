/**
 * Report Module
 * Writes stats.json and prints the run summary
 */

import chalk from "chalk";
import { formatDuration } from "../utils";
import type { ExportSummary } from "../types";
import type { ExportTracker } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Create a modern progress bar with percentage
 */
function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
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

/**
 * Command that re-exports exactly the failed workouts
 */
export function refreshHint(summary: ExportSummary): string | null {
  if (summary.failures.length === 0) return null;
  const ids = summary.failures.map((failure) => failure.id).join(",");
  return `workout-export export --athlete ${summary.owner} --refresh-ids ${ids}`;
}

// ============================================================================
// Main Report
// ============================================================================

export interface ReportOptions {
  statsPath: string;
  verbose?: boolean;
}

/**
 * Export stats to JSON and display the summary to console
 */
export async function report(
  summary: ExportSummary,
  tracker: ExportTracker,
  options: ReportOptions,
): Promise<void> {
  await tracker.exportStats(options.statsPath, summary);

  const hasErrors = summary.failed > 0;
  const wasCancelled = summary.status === "cancelled";

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : wasCancelled
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = wasCancelled ? "Export Cancelled" : "Export Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(`athlete ${summary.owner}`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayWorkoutsSection(summary);
  displayIssuesSection(summary, tracker, options.verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayWorkoutsSection(summary: ExportSummary): void {
  console.log(sectionHeader("Workouts"));

  // Everything done so far, against everything discovered
  console.log(`   ${progressBar(summary.skipped + summary.succeeded, summary.discovered)}`);

  console.log(statRow(chalk.cyan("◉"), "Discovered", summary.discovered, chalk.cyan));
  console.log(statRow(chalk.green("◉"), "Exported", summary.succeeded, chalk.green));

  if (summary.skipped > 0) {
    console.log(statRow(chalk.dim("◉"), "Already done", summary.skipped, chalk.dim));
  }
  if (summary.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failed, chalk.red));
  }
  if (summary.cancelled > 0) {
    console.log(statRow(chalk.yellow("◉"), "Left for next run", summary.cancelled, chalk.yellow));
  }
}

function displayIssuesSection(
  summary: ExportSummary,
  tracker: ExportTracker,
  verbose?: boolean,
): void {
  const configIssues = tracker.getConfigIssues();
  if (summary.failures.length === 0 && configIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (summary.failures.length > 0) {
    console.log(statRow(chalk.red("✖"), "Workouts failed", summary.failures.length, chalk.red));

    const shown = verbose ? summary.failures : summary.failures.slice(0, 5);
    for (const failure of shown) {
      console.log(`      ${chalk.dim("·")} ${failure.id} ${chalk.dim(`(${failure.kind})`)}`);
      if (verbose) {
        console.log(`        ${chalk.dim(failure.reason)}`);
      }
    }
    if (shown.length < summary.failures.length) {
      console.log(`      ${chalk.dim(`  +${summary.failures.length - shown.length} more`)}`);
    }

    const hint = refreshHint(summary);
    if (hint) {
      console.log(`\n   ${chalk.dim("Retry them with:")} ${chalk.white(hint)}`);
    }
  }

  if (configIssues.length > 0) {
    console.log(statRow(chalk.yellow("✖"), "Config files", configIssues.length, chalk.yellow));
    for (const issue of configIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
