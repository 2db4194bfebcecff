import chalk from "chalk";

import { errorMessage } from "../../utils/errors.js";
import { parseLimit } from "../../utils/pagination.js";
import {
  displayLogs,
  displayTaskStatus,
  displayTaskTable,
} from "../utils/display.js";
import { withServices } from "../utils/services.js";

import type { Command } from "commander";

function parseTaskId(value: string): number | null {
  const id = Number.parseInt(value, 10);
  return Number.isInteger(id) && id > 0 && String(id) === value.trim() ? id : null;
}

function fail(message: string): void {
  console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
}

// ============================================================================
// Task Commands
// ============================================================================

export function registerTasksCommand(program: Command): void {
  const tasks = program
    .command("tasks")
    .description("Inspect scrape task history and logs");

  // tasks history
  tasks
    .command("history")
    .description("List recent tasks, newest first")
    .option("-l, --limit <n>", "Number of tasks to show", "20")
    .action(async (options: { limit: string }) => {
      try {
        await withServices(async ({ orchestrator }) => {
          const rows = await orchestrator.history(parseLimit(options.limit, 20, 200));
          if (rows.length === 0) {
            console.log("No tasks recorded yet");
            return;
          }
          displayTaskTable(rows);
        });
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  // tasks show <id>
  tasks
    .command("show <id>")
    .description("Show a task's progress, counters and errors")
    .option("-e, --errors <n>", "Number of errors to list", "20")
    .action(async (id: string, options: { errors: string }) => {
      const taskId = parseTaskId(id);
      if (taskId === null) {
        fail(`Invalid task id "${id}"`);
        return;
      }

      try {
        await withServices(async ({ orchestrator }) => {
          const view = await orchestrator.status(taskId);
          if (view === null) {
            fail(`Task ${String(taskId)} not found`);
            return;
          }
          displayTaskStatus(view, parseLimit(options.errors, 20, 10_000));
        });
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  // tasks logs <id>
  tasks
    .command("logs <id>")
    .description("Print a task's log lines")
    .action(async (id: string) => {
      const taskId = parseTaskId(id);
      if (taskId === null) {
        fail(`Invalid task id "${id}"`);
        return;
      }

      try {
        await withServices(async ({ orchestrator }) => {
          const entries = await orchestrator.logs(taskId);
          if (entries.length === 0) {
            console.log(`No log lines for task ${String(taskId)}`);
            return;
          }
          displayLogs(entries);
        });
      } catch (error) {
        fail(errorMessage(error));
      }
    });
}
