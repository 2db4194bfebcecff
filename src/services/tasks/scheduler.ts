/**
 * Scheduler - starts the configured task kinds at a fixed interval
 */

import { TaskConflictError } from "./registry.js";
import { taskLogger } from "../../logger.js";
import { errorMessage } from "../../utils/errors.js";

import type { TaskOrchestrator } from "./orchestrator.js";
import type { TaskKind } from "../../types/index.js";

export interface SchedulerOptions {
  intervalMinutes: number;
  kinds: TaskKind[];
}

export class ScrapeScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly orchestrator: Pick<TaskOrchestrator, "start">,
    private readonly options: SchedulerOptions
  ) {}

  start(): void {
    if (this.timer !== null) {
      taskLogger.warn("Scheduler already running");
      return;
    }

    const intervalMs = this.options.intervalMinutes * 60_000;
    taskLogger.info(
      { intervalMinutes: this.options.intervalMinutes, kinds: this.options.kinds },
      "Starting scrape scheduler"
    );

    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        taskLogger.error({ error: errorMessage(error) }, "Scheduler tick failed");
      });
    }, intervalMs);
    // The schedule alone must not keep the process alive
    this.timer.unref();
  }

  stop(): void {
    if (this.timer !== null) {
      taskLogger.info("Stopping scrape scheduler");
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Start every configured kind, skipping kinds that are still running.
   * Returns the ids of the tasks started.
   */
  async tick(): Promise<number[]> {
    const started: number[] = [];

    for (const kind of this.options.kinds) {
      try {
        started.push(await this.orchestrator.start(kind, "scheduled"));
      } catch (error) {
        if (!(error instanceof TaskConflictError)) throw error;
        taskLogger.info(
          { kind, activeTaskId: error.activeTaskId },
          "Scheduled task skipped, previous run still active"
        );
      }
    }

    return started;
  }
}
