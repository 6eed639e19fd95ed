/**
 * Stats Module
 * Displays a build summary
 */

import chalk from "chalk";
import type { BuildContext, BuildStats } from "../types";

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

export function buildDuration(stats: BuildStats): number {
  const end = stats.endTime ?? new Date();
  return end.getTime() - stats.startTime.getTime();
}

// ============================================================================
// Main Stats Display
// ============================================================================

export async function stats(ctx: BuildContext): Promise<void> {
  const { stats } = ctx;

  console.log("");
  console.log(
    `  ${chalk.green("✔")} ${chalk.bold("Build Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(buildDuration(stats)))}`,
  );

  console.log(sectionHeader("Content"));
  console.log(statRow(chalk.green("◉"), "Posts", stats.posts, chalk.green));
  console.log(statRow(chalk.cyan("◉"), "Tags", stats.tags, chalk.cyan));

  console.log(sectionHeader("Output"));
  console.log(statRow(chalk.green("◉"), "Pages", stats.pages, chalk.green));
  console.log(statRow(chalk.green("◉"), "Feeds", stats.feeds, chalk.green));
  if (stats.assets > 0) {
    console.log(statRow(chalk.cyan("◉"), "Assets", stats.assets, chalk.cyan));
  }

  console.log("");
}
