/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStats } from "../../db/migrate.js";
import type { TaskSummary } from "../../services/tasks/ledger.js";
import type { TaskStatusView } from "../../services/tasks/orchestrator.js";
import type { TaskLogEntry, TaskStatus } from "../../types/index.js";

function colorStatus(status: TaskStatus): string {
  switch (status) {
    case "running":
      return chalk.blue(status);
    case "success":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    case "cancelled":
      return chalk.yellow(status);
  }
}

function formatTime(iso: string | null): string {
  if (iso === null) {
    return chalk.gray("-");
  }
  return iso.replace("T", " ").slice(0, 19);
}

/**
 * Display task history in a formatted table
 */
export function displayTaskTable(tasks: TaskSummary[]): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("ID"),
      chalk.cyan("Kind"),
      chalk.cyan("Status"),
      chalk.cyan("Trigger"),
      chalk.cyan("Started"),
      chalk.cyan("Finished"),
      chalk.cyan("Units"),
      chalk.cyan("Errors"),
    ],
  });

  for (const task of tasks) {
    table.push([
      String(task.id),
      task.kind,
      colorStatus(task.status),
      task.trigger,
      formatTime(task.startedAt),
      formatTime(task.finishedAt),
      `${String(task.completedUnits)}/${String(task.totalUnits)}`,
      task.errors.length > 0 ? chalk.red(String(task.errors.length)) : "0",
    ]);
  }

  console.log(table.toString());
}

/**
 * Display one task's progress, counters and errors
 */
export function displayTaskStatus(task: TaskStatusView, errorLimit = 20): void {
  console.log(chalk.bold.underline(`\nTask ${String(task.id)}: ${task.kind}\n`));

  console.log(`  Status:    ${colorStatus(task.status)} (${task.trigger})`);
  console.log(`  Started:   ${formatTime(task.startedAt)}`);
  console.log(`  Finished:  ${formatTime(task.finishedAt)}`);
  console.log(
    `  Progress:  ${String(task.totals.completed)}/${String(task.totals.total)} units`
  );
  if (task.currentUnit !== null) {
    console.log(`  Current:   ${task.currentUnit}`);
  }

  const counters = Object.entries(task.totals.perEntity);
  if (counters.length > 0) {
    console.log(chalk.bold("\nMerged records:"));
    for (const [name, count] of counters) {
      console.log(`  ${name.padEnd(20)} ${String(count)}`);
    }
  }

  if (task.errorCount > 0) {
    console.log(chalk.bold(`\nErrors (${String(task.errorCount)}):`));
    for (const error of task.errors.slice(0, errorLimit)) {
      console.log(`  ${chalk.red("•")} ${error}`);
    }
    if (task.errorCount > errorLimit) {
      console.log(
        chalk.gray(`  ... and ${String(task.errorCount - errorLimit)} more`)
      );
    }
  }
  console.log();
}

export function displayLogs(entries: TaskLogEntry[]): void {
  for (const entry of entries) {
    console.log(`${chalk.gray(formatTime(entry.timestamp))}  ${entry.message}`);
  }
}

export function displayTableStats(stats: TableStats[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
    colAligns: ["left", "right"],
  });
  for (const row of stats) {
    table.push([row.table_name, String(row.row_count)]);
  }
  console.log(table.toString());
}
