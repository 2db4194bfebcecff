/**
 * TaskOrchestrator - runs scrape tasks in the background
 *
 * A task walks its plan unit by unit: fetch, extract, merge. Failures inside
 * a unit are recorded and the task moves on; a store failure ends the task
 * as failed. Cancellation is checked before every unit.
 */

import { buildPlan, type PlanContext } from "./plans.js";
import {
  TaskRegistry,
  type ProgressSnapshot,
  type TaskHandle,
} from "./registry.js";
import { taskLogger } from "../../logger.js";
import { Pacer, sleep as defaultSleep, type Sleep } from "../../utils/time.js";
import { errorMessage } from "../../utils/errors.js";
import { StoreUnavailableError } from "../store/reconciliation.js";

import type { TaskLedger, TaskSummary } from "./ledger.js";
import type { AppConfig } from "../../config.js";
import type { UpstreamClient } from "../../scraper/client.js";
import type { Extraction } from "../../scraper/extract/index.js";
import type {
  TaskCounters,
  TaskKind,
  TaskLogEntry,
  TaskStatus,
  TaskTrigger,
} from "../../types/index.js";
import type { ReconciliationStore } from "../store/reconciliation.js";

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorDeps {
  store: ReconciliationStore;
  ledger: TaskLedger;
  client: Pick<UpstreamClient, "fetch">;
  settings: AppConfig["scrape"];
  registry?: TaskRegistry;
  sleep?: Sleep;
  clock?: () => Date;
}

export interface TaskStatusView {
  id: number;
  kind: TaskKind;
  status: TaskStatus;
  trigger: TaskTrigger;
  startedAt: string;
  finishedAt: string | null;
  totals: {
    total: number;
    completed: number;
    perEntity: TaskCounters;
  };
  currentUnit: string | null;
  errorCount: number;
  errors: string[];
}

export type CancelResult = "acknowledged" | "not-running";

function toSummary(snapshot: ProgressSnapshot): TaskSummary {
  return {
    id: snapshot.taskId,
    kind: snapshot.kind,
    status: snapshot.status,
    trigger: snapshot.trigger,
    startedAt: snapshot.startedAt,
    finishedAt: snapshot.finishedAt,
    totalUnits: snapshot.totalUnits,
    completedUnits: snapshot.completedUnits,
    currentUnit: snapshot.currentUnit,
    counters: { ...snapshot.counters },
    errors: [...snapshot.errors],
  };
}

export function toStatusView(summary: TaskSummary): TaskStatusView {
  return {
    id: summary.id,
    kind: summary.kind,
    status: summary.status,
    trigger: summary.trigger,
    startedAt: summary.startedAt,
    finishedAt: summary.finishedAt,
    totals: {
      total: summary.totalUnits,
      completed: summary.completedUnits,
      perEntity: summary.counters,
    },
    currentUnit: summary.currentUnit,
    errorCount: summary.errors.length,
    errors: summary.errors,
  };
}

// ============================================================================
// Task run state
// ============================================================================

/**
 * Mutable state owned by one worker. Readers only ever see the snapshots it
 * publishes through the handle.
 */
class TaskRun {
  totalUnits = 0;
  completedUnits = 0;
  currentUnit: string | null = null;
  readonly counters: TaskCounters = {};
  readonly errors: string[] = [];

  constructor(
    readonly taskId: number,
    readonly kind: TaskKind,
    readonly trigger: TaskTrigger,
    readonly startedAt: string,
    readonly handle: TaskHandle,
    private readonly clock: () => Date
  ) {}

  count(name: keyof TaskCounters): void {
    this.counters[name] = (this.counters[name] ?? 0) + 1;
  }

  fail(label: string, message: string): void {
    this.errors.push(`${label}: ${message}`);
    this.log(`${label}: ${message}`);
  }

  log(message: string): void {
    this.handle.log(message, this.clock().toISOString());
  }

  publish(status: TaskStatus = "running", finishedAt: string | null = null): void {
    this.handle.publish({
      taskId: this.taskId,
      kind: this.kind,
      trigger: this.trigger,
      status,
      startedAt: this.startedAt,
      finishedAt,
      totalUnits: this.totalUnits,
      completedUnits: this.completedUnits,
      currentUnit: this.currentUnit,
      counters: this.counters,
      errors: this.errors,
    });
  }

  progress(): {
    totalUnits: number;
    completedUnits: number;
    currentUnit: string | null;
    counters: TaskCounters;
    errors: string[];
  } {
    return {
      totalUnits: this.totalUnits,
      completedUnits: this.completedUnits,
      currentUnit: this.currentUnit,
      counters: { ...this.counters },
      errors: [...this.errors],
    };
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

export class TaskOrchestrator {
  private readonly registry: TaskRegistry;
  private readonly sleep: Sleep;
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.registry =
      deps.registry ?? new TaskRegistry(deps.settings.maxLogEntries);
    this.sleep = deps.sleep ?? defaultSleep;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Start a task in the background and return its id.
   * Throws TaskConflictError when a task of the same kind is active.
   */
  async start(kind: TaskKind, trigger: TaskTrigger = "manual"): Promise<number> {
    // Reserved before the first await
    const handle = this.registry.reserve(kind);

    const startedAt = this.clock().toISOString();
    let taskId: number;
    try {
      taskId = await this.deps.ledger.create({ kind, trigger, startedAt });
    } catch (error) {
      this.registry.release(handle);
      throw error;
    }
    handle.bind(taskId);

    const run = new TaskRun(taskId, kind, trigger, startedAt, handle, this.clock);
    run.publish();
    run.log(`Started ${kind} task (${trigger})`);
    taskLogger.info({ taskId, kind, trigger }, "Task started");

    handle.track(
      this.execute(run).catch((error: unknown) => {
        taskLogger.error(
          { taskId, kind, error: errorMessage(error) },
          "Task worker crashed"
        );
      })
    );
    return taskId;
  }

  async status(taskId: number): Promise<TaskStatusView | null> {
    const live = this.registry.findByTaskId(taskId)?.snapshot();
    if (live !== undefined && live !== null) {
      return toStatusView(toSummary(live));
    }
    const stored = await this.deps.ledger.get(taskId);
    return stored !== null ? toStatusView(stored) : null;
  }

  cancel(taskId: number): CancelResult {
    const handle = this.registry.findByTaskId(taskId);
    if (handle === undefined) {
      return "not-running";
    }
    if (!handle.token.cancelled) {
      handle.token.cancel();
      handle.log("Cancellation requested", this.clock().toISOString());
      taskLogger.info({ taskId, kind: handle.kind }, "Cancellation requested");
    }
    return "acknowledged";
  }

  async logs(taskId: number): Promise<TaskLogEntry[]> {
    const handle = this.registry.findByTaskId(taskId);
    if (handle !== undefined) {
      return handle.logs();
    }
    return this.deps.ledger.getLogs(taskId);
  }

  /**
   * Newest first, with running tasks shown at their live progress
   */
  async history(limit = 20): Promise<TaskSummary[]> {
    const rows = await this.deps.ledger.list(limit);
    return rows.map((row) => {
      const live = this.registry.findByTaskId(row.id)?.snapshot();
      return live !== undefined && live !== null ? toSummary(live) : row;
    });
  }

  /**
   * Resolves once the task's worker has finalized it
   */
  async waitFor(taskId: number): Promise<void> {
    await this.registry.findByTaskId(taskId)?.done();
  }

  isRunning(kind: TaskKind): boolean {
    return this.registry.isActive(kind);
  }

  // ==========================================================================
  // Worker
  // ==========================================================================

  private planContext(run: TaskRun): PlanContext {
    const pacer = new Pacer(this.deps.settings.pacingMs, this.sleep);

    return {
      fetch: async (endpoint, params = {}) => {
        await pacer.pace();
        return this.deps.client.fetch(endpoint, params);
      },
      apply: (label, extraction) => this.apply(run, label, extraction),
      issue: (label, message) => {
        run.fail(label, message);
      },
      log: (message) => {
        run.log(message);
      },
    };
  }

  private async apply(
    run: TaskRun,
    label: string,
    extraction: Extraction
  ): Promise<void> {
    for (const issue of extraction.issues) {
      run.fail(label, issue);
    }
    for (const record of extraction.records) {
      const result = await this.deps.store.merge(record);
      if (result.status === "applied") {
        run.count(result.kind);
      } else {
        run.count("rejected");
        run.fail(label, `rejected ${result.kind}: ${result.reason}`);
      }
    }
  }

  private async execute(run: TaskRun): Promise<void> {
    const { settings, ledger } = this.deps;
    const { token } = run.handle;
    let status: Exclude<TaskStatus, "running"> = "success";

    try {
      const context = this.planContext(run);
      const plan = buildPlan(run.kind, {
        store: this.deps.store,
        includeWomenProfiles: settings.includeWomenProfiles,
      });

      const units = await plan(context);
      run.totalUnits = units.length;
      run.publish();
      await ledger.recordProgress(run.taskId, run.progress());

      for (const [index, unit] of units.entries()) {
        if (token.cancelled) break;

        run.currentUnit = unit.label;
        run.publish();

        try {
          await unit.run();
        } catch (error) {
          if (error instanceof StoreUnavailableError) throw error;
          run.fail(unit.label, errorMessage(error));
        }

        // A unit finishing after the cancel does not count
        if (!token.cancelled) {
          run.completedUnits++;
        }
        run.publish();
        await ledger.recordProgress(run.taskId, run.progress());

        if (index < units.length - 1 && !token.cancelled) {
          await this.sleep(settings.unitDelayMs);
        }
      }

      if (token.cancelled) {
        status = "cancelled";
      }
    } catch (error) {
      status = "failed";
      const message = errorMessage(error);
      run.errors.push(message);
      run.log(`Task failed: ${message}`);
      taskLogger.error({ taskId: run.taskId, error: message }, "Task failed");
    }

    await this.finalize(run, status);
  }

  private async finalize(
    run: TaskRun,
    status: Exclude<TaskStatus, "running">
  ): Promise<void> {
    const finishedAt = this.clock().toISOString();
    run.currentUnit = null;
    run.log(
      `Finished as ${status}: ${String(run.completedUnits)}/${String(run.totalUnits)} units, ${String(run.errors.length)} errors`
    );
    run.publish(status, finishedAt);

    try {
      const closed = await this.deps.ledger.finalize(run.taskId, {
        ...run.progress(),
        status,
        finishedAt,
      });
      if (!closed) {
        taskLogger.warn(
          { taskId: run.taskId, status },
          "Task row was already closed, final state not written"
        );
      }
      await this.deps.ledger.appendLogs(run.taskId, run.handle.logs());
    } finally {
      this.registry.release(run.handle);
      taskLogger.info(
        {
          taskId: run.taskId,
          kind: run.kind,
          status,
          completed: run.completedUnits,
          total: run.totalUnits,
          errors: run.errors.length,
        },
        "Task finished"
      );
    }
  }
}
