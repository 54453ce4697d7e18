/**
 * Stats Module
 * Displays the run summary on stderr and optionally exports it as JSON
 */

import chalk from "chalk";
import type {
  ConversionContext,
  DirectiveIssue,
  Issue,
  ProcessingStats,
  RegionIssue,
  ResourceIssue,
} from "../types";
import type { Tracker } from "../utils/tracker";

// ============================================================================
// Formatting Helpers
// ============================================================================

function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Progress bar with percentage
 */
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

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
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

const isDirectiveIssue = (i: Issue): i is DirectiveIssue => i.type === "directive";
const isRegionIssue = (i: Issue): i is RegionIssue => i.type === "region";
const isResourceIssue = (i: Issue): i is ResourceIssue => i.type === "resource";

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display the run summary. Writes to stderr: stdout may carry the document.
 */
export async function stats(
  ctx: ConversionContext,
  exportPath?: string,
): Promise<void> {
  const { tracker, verbose } = ctx;
  if (exportPath) {
    await tracker.exportStats(exportPath);
  }

  const stats = tracker.getStats();
  const hasWarnings = stats.issues.length > 0;
  const hasErrors = stats.issues.some(isResourceIssue);

  console.error("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.error(
    `  ${statusIcon} ${chalk.bold("Translation Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayLinesSection(stats);
  displayDirectivesSection(stats);
  displayIssuesSection(tracker, verbose);

  console.error("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayLinesSection(stats: ProcessingStats): void {
  console.error(sectionHeader("Lines"));

  console.error(statRow(chalk.green("◉"), "Read", stats.totalLines, chalk.green));
  console.error(statRow(chalk.cyan("◉"), "Text", stats.textLines, chalk.cyan));

  if (stats.literalLines > 0) {
    console.error(
      statRow(chalk.cyan("◉"), "Literal", stats.literalLines, chalk.cyan),
    );
  }

  if (stats.commentLines > 0) {
    console.error(
      statRow(chalk.dim("◉"), "Commented out", stats.commentLines, chalk.dim),
    );
  }

  console.error(
    statRow(chalk.green("◉"), "Written", stats.outputLines, chalk.green),
  );
}

function displayDirectivesSection(stats: ProcessingStats): void {
  if (stats.directiveLines === 0) {
    return;
  }

  console.error(sectionHeader("Directives"));

  const handled = stats.directiveLines - stats.unknownDirectives;
  console.error(`   ${progressBar(Math.max(handled, 0), stats.directiveLines)}`);

  console.error(
    statRow(chalk.green("◉"), "Lines", stats.directiveLines, chalk.green),
  );

  if (stats.ignoredDirectives > 0) {
    console.error(
      statRow(chalk.dim("◉"), "Ignored", stats.ignoredDirectives, chalk.dim),
    );
  }

  if (stats.unknownDirectives > 0) {
    console.error(
      statRow(chalk.yellow("◉"), "Unsupported", stats.unknownDirectives, chalk.yellow),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const issues = tracker.getIssues();
  const { issueCount } = tracker.getStats();
  const directiveIssues = issues.filter(isDirectiveIssue);
  const regionIssues = issues.filter(isRegionIssue);
  const resourceIssues = issues.filter(isResourceIssue);

  if (issues.length === 0) {
    return;
  }

  console.error(sectionHeader(chalk.yellow("Issues")));

  if (directiveIssues.length > 0) {
    console.error(
      statRow(chalk.yellow("◆"), "Directives", directiveIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of directiveIssues.slice(0, 10)) {
        console.error(
          `      ${chalk.dim("·")} ${chalk.dim(`line ${issue.line}`)} ${issue.reason}: ${issue.details}`,
        );
      }
      if (directiveIssues.length > 10) {
        console.error(`      ${chalk.dim(`  +${directiveIssues.length - 10} more`)}`);
      }
    }
  }

  if (regionIssues.length > 0) {
    console.error(
      statRow(chalk.yellow("◆"), "Regions", regionIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of regionIssues) {
        console.error(
          `      ${chalk.dim("·")} ${chalk.dim(`line ${issue.line}`)} ${issue.details}`,
        );
      }
    }
  }

  if (issueCount > issues.length) {
    console.error(
      statRow(chalk.dim("◆"), "Not itemized", issueCount - issues.length, chalk.dim),
    );
  }

  if (resourceIssues.length > 0) {
    console.error(
      statRow(chalk.red("✖"), "Config failed", resourceIssues.length, chalk.red),
    );
    for (const issue of resourceIssues) {
      console.error(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose) {
        console.error(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
