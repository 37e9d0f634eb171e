import chalk from "chalk";
import type { IssueRecord, Tally, WrappedSummary } from "../types";
import { UNSET_BUCKET } from "./field-values";
import { wrapText } from "./text-wrap";

/**
 * Options controlling the printed report
 */
export interface DisplayOptions {
  /** Print a detail block for every issue */
  verbose: boolean;
  /** Wrap width of detail lines and separators */
  lineLength: number;
}

/**
 * Displays the wrapped summary in a formatted, readable way
 */
export function displayWrappedSummary(
  summary: WrappedSummary,
  { verbose, lineLength }: DisplayOptions
): void {
  console.log(
    "\n" +
      chalk.bold.blue(
        `📊 Jira Wrapped for ${summary.user}: last ${summary.timelineDays} days (since ${summary.since})`
      )
  );
  console.log(`  ${chalk.white("Issues:")} ${summary.total}`);
  console.log(`  ${chalk.green("Completed:")} ${summary.completed}`);

  displayTally("By Project", summary.byProject);
  displayTally("By Status", summary.byStatus);
  displayTally("By Issue Type", summary.byIssueType);
  displayTally("By Role", summary.byRole);
  Object.entries(summary.byField).forEach(([name, buckets]) => {
    displayTally(`By ${name}`, buckets);
  });

  console.log(
    "\n" + chalk.bold(`🏔️  Epics Participated In: ${summary.epics.length}`)
  );
  summary.epics.forEach((epic, index) => {
    console.log(`  ${index + 1}. ${epic}`);
  });

  if (verbose) {
    displayIssueDetails(summary.issues, lineLength);
  }

  console.log("\n" + chalk.green("That's a wrap!"));
}

/**
 * Displays one tally section, largest bucket first
 */
export function displayTally(title: string, buckets: Tally): void {
  console.log("\n" + chalk.bold(title));

  if (buckets.length === 0) {
    console.log(chalk.gray("  No issues"));
    return;
  }

  buckets.forEach((bucket) => {
    console.log(`  ${bucket.key}: ${bucket.count}`);
  });
}

/**
 * Displays a detail block per issue, wrapped to the line length
 */
export function displayIssueDetails(
  issues: IssueRecord[],
  lineLength: number
): void {
  console.log("\n" + chalk.bold("📝 Issue Details"));

  issues.forEach((issue) => {
    console.log(chalk.bold(`Issue Key: ${issue.key}`));

    detailLines(issue).forEach(([label, value]) => {
      console.log(chalk.gray("-".repeat(lineLength)));
      wrapText(`${label}: ${value}`, lineLength).forEach((line) => {
        console.log(line);
      });
    });

    console.log(chalk.gray("=".repeat(lineLength)));
  });
}

function detailLines(issue: IssueRecord): Array<[string, string]> {
  return [
    ["Title", issue.summary],
    ["Status", issue.status],
    ["Project", issue.project],
    ["Type", issue.issueType],
    ["Role", issue.role],
    ["Assignee", issue.assignee],
    ["Reporter", issue.reporter],
    ["Created", issue.created ?? "N/A"],
    ["Updated", issue.updated ?? "N/A"],
    ["Resolved", issue.resolved ?? "N/A"],
    ...Object.entries(issue.customFields).map(
      ([name, value]): [string, string] => [name, value ?? UNSET_BUCKET]
    ),
    ["Description", issue.description],
  ];
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error): void {
  console.error(chalk.red("\n❌ Error:"), message);
  if (error?.stack && process.env.NODE_ENV === "development") {
    console.error(chalk.gray(error.stack));
  }
}
