/**
 * Stats Module
 * Displays the run summary and writes stats.json
 */

import chalk from "chalk";
import path from "node:path";
import type {
  RunContext,
  RunStats,
  RunTracker,
  TaskIssue,
  ResourceIssue,
} from "../types";

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

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
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

/**
 * Export stats to JSON and display the grand total to console
 */
export async function stats(ctx: RunContext): Promise<void> {
  const { config, tracker, verbose, dryRun } = ctx;
  if (!dryRun) {
    await tracker.exportStats(config.output.directory);
  }

  const stats = tracker.getStats();
  const hasErrors = stats.total.errors > 0;
  const hasWarnings = tracker.getIssuesOfType("resource").length > 0;

  console.log("");
  console.log(chalk.dim("=".repeat(60)));

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold(dryRun ? "Dry Run Complete" : "Download Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayTotalSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log(chalk.dim("=".repeat(60)));
}

// ============================================================================
// Section Displays
// ============================================================================

function displayTotalSection(stats: RunStats): void {
  const { total } = stats;
  console.log(
    sectionHeader(`Total Summary (${stats.batches.length} batches)`),
  );

  const done = total.downloaded + total.skipped;
  console.log(`   ${progressBar(done, stats.tasks)}`);

  console.log(
    statRow(chalk.green("◉"), "Total Downloaded", total.downloaded, chalk.green),
  );
  console.log(
    statRow(chalk.cyan("◉"), "Total Skipped", total.skipped, chalk.cyan),
  );
  console.log(
    statRow(
      total.errors > 0 ? chalk.red("◉") : chalk.dim("◉"),
      "Total Errors",
      total.errors,
      total.errors > 0 ? chalk.red : chalk.dim,
    ),
  );
}

function displayIssuesSection(tracker: RunTracker, verbose?: boolean): void {
  const taskIssues: TaskIssue[] = tracker.getIssuesOfType("task");
  const resourceIssues: ResourceIssue[] = tracker.getIssuesOfType("resource");

  if (taskIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (taskIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Photos failed", taskIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of taskIssues.slice(0, 10)) {
        console.log(
          `      ${chalk.dim("·")} ${path.basename(issue.path)} ${chalk.dim(`(${issue.reason})`)}`,
        );
      }
      if (taskIssues.length > 10) {
        console.log(`      ${chalk.dim(`  +${taskIssues.length - 10} more`)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
