import chalk from "chalk";
import ora from "ora";

import { migrate } from "../../db/migrate.js";
import { TASK_KINDS, isTaskKind } from "../../types/index.js";
import { errorMessage } from "../../utils/errors.js";
import { sleep } from "../../utils/time.js";
import { displayTaskStatus } from "../utils/display.js";
import { withServices } from "../utils/services.js";

import type { TaskStatusView } from "../../services/tasks/orchestrator.js";
import type { Command } from "commander";

const POLL_INTERVAL_MS = 500;

function progressText(view: TaskStatusView): string {
  const units = `${String(view.totals.completed)}/${String(view.totals.total)}`;
  const current = view.currentUnit !== null ? ` ${chalk.gray(view.currentUnit)}` : "";
  return `${view.kind}: ${units} units${current}`;
}

// ============================================================================
// Scrape Command
// ============================================================================

export function registerScrapeCommand(program: Command): void {
  program
    .command("scrape <kind>")
    .description(
      `Run a scrape task in the foreground (${TASK_KINDS.join(", ")}). Ctrl-C cancels after the current unit.`
    )
    .action(async (kind: string) => {
      if (!isTaskKind(kind)) {
        console.error(
          chalk.red(`Unknown task kind "${kind}". Expected one of: ${TASK_KINDS.join(", ")}`)
        );
        process.exitCode = 1;
        return;
      }

      const spinner = ora(`Starting ${kind} task...`).start();

      try {
        await withServices(async ({ database, orchestrator }) => {
          await migrate(database.db, database.dialect);
          const taskId = await orchestrator.start(kind, "manual");

          const onInterrupt = (): void => {
            orchestrator.cancel(taskId);
            spinner.text = "Cancelling after the current unit...";
          };
          process.once("SIGINT", onInterrupt);

          let settled = false;
          const worker = orchestrator.waitFor(taskId).then(() => {
            settled = true;
          });

          try {
            while (!settled) {
              const view = await orchestrator.status(taskId);
              if (view !== null && view.status === "running") {
                spinner.text = progressText(view);
              }
              await Promise.race([worker, sleep(POLL_INTERVAL_MS)]);
            }
          } finally {
            process.removeListener("SIGINT", onInterrupt);
          }

          const final = await orchestrator.status(taskId);
          if (final === null) {
            spinner.fail(`Task ${String(taskId)} disappeared from the ledger`);
            process.exitCode = 1;
            return;
          }

          const summary = `Task ${String(taskId)} ${final.status}: ${String(final.totals.completed)}/${String(final.totals.total)} units`;
          if (final.status === "success") {
            spinner.succeed(summary);
          } else if (final.status === "cancelled") {
            spinner.warn(summary);
          } else {
            spinner.fail(summary);
            process.exitCode = 1;
          }
          displayTaskStatus(final);
        });
      } catch (error) {
        spinner.fail(`Scrape failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
