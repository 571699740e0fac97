/**
 * Stats Module
 * Displays harvest statistics and issues
 */

import chalk from "chalk";
import type {
  HarvestContext,
  ProcessingStats,
  RunResult,
  Tracker,
} from "../types";
import { describeError } from "../utils";

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

  const percentage = Math.min(current / total, 1);
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
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
 * Export stats to JSON and display the run summary to the console
 */
export async function stats(
  ctx: HarvestContext,
  result: RunResult,
): Promise<void> {
  const { config, tracker, verbose } = ctx;
  try {
    const statsPath = await tracker.exportStats(config.storage.output);
    ctx.logger.debug(`Stats written to ${statsPath}`);
  } catch (error) {
    ctx.logger.warn(`Could not write stats: ${describeError(error)}`);
  }

  const summary = tracker.getStats();

  console.log("");

  const statusIcon =
    result.status === "success"
      ? chalk.green("✔")
      : result.status === "partial"
        ? chalk.yellow("◆")
        : chalk.red("✖");
  const statusText =
    result.status === "success"
      ? "Harvest Complete"
      : result.status === "partial"
        ? "Harvest Incomplete"
        : "Nothing To Download";

  console.log(
    `  ${statusIcon} ${chalk.bold(statusText)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayPagesSection(summary);
  displayImagesSection(summary, config.images.count);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Pages"));

  console.log(`   ${progressBar(stats.harvestedPages, stats.totalPages)}`);
  console.log(
    statRow(chalk.green("◉"), "Harvested", stats.harvestedPages, chalk.green),
  );

  if (stats.failedPages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedPages, chalk.red),
    );
  }

  console.log(
    statRow(chalk.cyan("◉"), "Candidates", stats.candidates, chalk.cyan),
  );
}

function displayImagesSection(stats: ProcessingStats, target: number): void {
  if (stats.batches === 0) {
    return;
  }

  console.log(sectionHeader("Images"));

  console.log(`   ${progressBar(stats.downloadedImages, target)}`);
  console.log(
    statRow(
      chalk.green("◉"),
      "Stored",
      `${stats.downloadedImages}/${target}`,
      chalk.green,
    ),
  );

  if (stats.failedImages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedImages, chalk.red),
    );
  }

  console.log(statRow(chalk.cyan("◉"), "Batches", stats.batches, chalk.cyan));
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const pageIssues = tracker.getIssues("page");
  const imageIssues = tracker.getIssues("image");
  const resourceIssues = tracker.getIssues("resource");

  const hasIssues =
    pageIssues.length > 0 ||
    imageIssues.length > 0 ||
    resourceIssues.length > 0;

  if (!hasIssues) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (pageIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Pages failed", pageIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of pageIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (imageIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Images failed",
        imageIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of imageIssues.slice(0, 5)) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      }
      if (imageIssues.length > 5) {
        console.log(`      ${chalk.dim(`  +${imageIssues.length - 5} more`)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Configs failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
      }
    }
  }
}
