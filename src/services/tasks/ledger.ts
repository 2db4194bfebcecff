/**
 * TaskLedger - durable record of every scrape task and its log lines
 *
 * Rows are written when a task starts, after each unit and once more when it
 * reaches a terminal state. Any failed write surfaces as
 * StoreUnavailableError, which is fatal to the running task.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { dbLogger } from "../../logger.js";
import { isTaskKind } from "../../types/index.js";
import { errorMessage } from "../../utils/errors.js";
import { StoreUnavailableError } from "../store/reconciliation.js";

import type { Database, ScrapeTask } from "../../db/types.js";
import type {
  TaskCounters,
  TaskKind,
  TaskLogEntry,
  TaskStatus,
  TaskTrigger,
} from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface TaskSummary {
  id: number;
  kind: TaskKind;
  status: TaskStatus;
  trigger: TaskTrigger;
  startedAt: string;
  finishedAt: string | null;
  totalUnits: number;
  completedUnits: number;
  currentUnit: string | null;
  counters: TaskCounters;
  errors: string[];
}

export interface TaskProgress {
  totalUnits: number;
  completedUnits: number;
  currentUnit: string | null;
  counters: TaskCounters;
  errors: string[];
}

export interface TaskOutcome extends TaskProgress {
  status: Exclude<TaskStatus, "running">;
  finishedAt: string;
}

// ============================================================================
// Column codecs
// ============================================================================

const COUNTER_NAMES = [
  "organization",
  "player",
  "match",
  "opponent-stat",
  "competition",
  "competition-series",
  "registration",
  "rejected",
] as const satisfies ReadonlyArray<keyof TaskCounters>;

const CountersColumn = Type.Record(Type.String(), Type.Integer({ minimum: 0 }));
const ErrorsColumn = Type.Array(Type.String());

const TASK_STATUSES: readonly TaskStatus[] = [
  "running",
  "success",
  "failed",
  "cancelled",
];

function isTaskStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((status) => status === value);
}

function isTaskTrigger(value: string): value is TaskTrigger {
  return value === "manual" || value === "scheduled";
}

function readJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function decodeCounters(text: string): TaskCounters {
  const parsed = readJson(text);
  if (!Value.Check(CountersColumn, parsed)) {
    return {};
  }
  const stored: Static<typeof CountersColumn> = parsed;
  const counters: TaskCounters = {};
  for (const name of COUNTER_NAMES) {
    const value = stored[name];
    if (value !== undefined) {
      counters[name] = value;
    }
  }
  return counters;
}

function decodeErrors(text: string): string[] {
  const parsed = readJson(text);
  return Value.Check(ErrorsColumn, parsed) ? parsed : [];
}

function toSummary(row: ScrapeTask): TaskSummary {
  const { kind, status, trigger } = row;
  if (!isTaskKind(kind) || !isTaskStatus(status) || !isTaskTrigger(trigger)) {
    throw new StoreUnavailableError(
      `Task ${String(row.id)} has an unreadable kind, status or trigger`
    );
  }

  return {
    id: row.id,
    kind,
    status,
    trigger,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    totalUnits: row.total_units,
    completedUnits: row.completed_units,
    currentUnit: row.current_unit,
    counters: decodeCounters(row.counters),
    errors: decodeErrors(row.errors),
  };
}

// Keeps multi-row inserts well under the bound-parameter limit
const LOG_BATCH_SIZE = 200;

// ============================================================================
// Ledger
// ============================================================================

export class TaskLedger {
  constructor(private db: Kysely<Database>) {}

  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      dbLogger.error({ operation, error: errorMessage(error) }, "Ledger write failed");
      throw new StoreUnavailableError(
        `Task ledger ${operation} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async create(task: {
    kind: TaskKind;
    trigger: TaskTrigger;
    startedAt: string;
  }): Promise<number> {
    return this.guard("create", async () => {
      const row = await this.db
        .insertInto("scrape_tasks")
        .values({
          kind: task.kind,
          status: "running",
          trigger: task.trigger,
          started_at: task.startedAt,
          finished_at: null,
          total_units: 0,
          completed_units: 0,
          current_unit: null,
          counters: "{}",
          errors: "[]",
        })
        .returning("id")
        .executeTakeFirstOrThrow();
      return row.id;
    });
  }

  /**
   * Only a running row takes progress. Resolves to false when the row was
   * already closed.
   */
  async recordProgress(id: number, progress: TaskProgress): Promise<boolean> {
    return this.guard("progress", async () => {
      const result = await this.db
        .updateTable("scrape_tasks")
        .set({
          total_units: progress.totalUnits,
          completed_units: progress.completedUnits,
          current_unit: progress.currentUnit,
          counters: JSON.stringify(progress.counters),
          errors: JSON.stringify(progress.errors),
        })
        .where("id", "=", id)
        .where("status", "=", "running")
        .executeTakeFirst();
      return Number(result.numUpdatedRows) > 0;
    });
  }

  /**
   * Closes a running row. A row that is already terminal is left as it is
   * and the call resolves to false.
   */
  async finalize(id: number, outcome: TaskOutcome): Promise<boolean> {
    return this.guard("finalize", async () => {
      const result = await this.db
        .updateTable("scrape_tasks")
        .set({
          status: outcome.status,
          finished_at: outcome.finishedAt,
          total_units: outcome.totalUnits,
          completed_units: outcome.completedUnits,
          current_unit: outcome.currentUnit,
          counters: JSON.stringify(outcome.counters),
          errors: JSON.stringify(outcome.errors),
        })
        .where("id", "=", id)
        .where("status", "=", "running")
        .executeTakeFirst();
      return Number(result.numUpdatedRows) > 0;
    });
  }

  async get(id: number): Promise<TaskSummary | null> {
    const row = await this.guard("read", () =>
      this.db
        .selectFrom("scrape_tasks")
        .selectAll()
        .where("id", "=", id)
        .executeTakeFirst()
    );
    return row !== undefined ? toSummary(row) : null;
  }

  /**
   * Most recent tasks first
   */
  async list(limit = 20): Promise<TaskSummary[]> {
    const rows = await this.guard("read", () =>
      this.db
        .selectFrom("scrape_tasks")
        .selectAll()
        .orderBy("id", "desc")
        .limit(limit)
        .execute()
    );
    return rows.map(toSummary);
  }

  async appendLogs(
    taskId: number,
    entries: TaskLogEntry[],
    firstSeq = 0
  ): Promise<void> {
    if (entries.length === 0) {
      return;
    }

    await this.guard("logs", async () => {
      for (let start = 0; start < entries.length; start += LOG_BATCH_SIZE) {
        const batch = entries.slice(start, start + LOG_BATCH_SIZE);
        await this.db
          .insertInto("task_logs")
          .values(
            batch.map((entry, index) => ({
              task_id: taskId,
              seq: firstSeq + start + index,
              logged_at: entry.timestamp,
              message: entry.message,
            }))
          )
          .execute();
      }
    });
  }

  async getLogs(taskId: number): Promise<TaskLogEntry[]> {
    const rows = await this.guard("read", () =>
      this.db
        .selectFrom("task_logs")
        .select(["logged_at", "message"])
        .where("task_id", "=", taskId)
        .orderBy("seq")
        .execute()
    );
    return rows.map((row) => ({ timestamp: row.logged_at, message: row.message }));
  }

  /**
   * Tasks left `running` by a process that exited are closed as cancelled.
   * Returns how many rows were closed.
   */
  async recoverInterrupted(now: Date = new Date()): Promise<number> {
    return this.guard("recover", async () => {
      const rows = await this.db
        .selectFrom("scrape_tasks")
        .select(["id", "errors"])
        .where("status", "=", "running")
        .execute();

      for (const row of rows) {
        const errors = [
          ...decodeErrors(row.errors),
          "interrupted: the process stopped before the task finished",
        ];
        await this.db
          .updateTable("scrape_tasks")
          .set({
            status: "cancelled",
            finished_at: now.toISOString(),
            current_unit: null,
            errors: JSON.stringify(errors),
          })
          .where("id", "=", row.id)
          .where("status", "=", "running")
          .execute();
      }

      if (rows.length > 0) {
        dbLogger.warn({ count: rows.length }, "Closed interrupted tasks");
      }
      return rows.length;
    });
  }
}
