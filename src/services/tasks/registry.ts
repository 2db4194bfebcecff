/**
 * In-process registry of running tasks, at most one per kind
 */

import type {
  TaskCounters,
  TaskKind,
  TaskLogEntry,
  TaskStatus,
  TaskTrigger,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export class TaskConflictError extends Error {
  code = "TASK_CONFLICT" as const;

  constructor(
    readonly kind: TaskKind,
    readonly activeTaskId: number | null
  ) {
    super(
      activeTaskId !== null
        ? `A ${kind} task is already running (task ${String(activeTaskId)})`
        : `A ${kind} task is already starting`
    );
    this.name = "TaskConflictError";
  }
}

/**
 * Point-in-time view of a running task. Replaced, never mutated.
 */
export interface ProgressSnapshot {
  readonly taskId: number;
  readonly kind: TaskKind;
  readonly trigger: TaskTrigger;
  readonly status: TaskStatus;
  readonly startedAt: string;
  readonly finishedAt: string | null;
  readonly totalUnits: number;
  readonly completedUnits: number;
  readonly currentUnit: string | null;
  readonly counters: Readonly<TaskCounters>;
  readonly errors: readonly string[];
}

export class CancellationToken {
  private requested = false;

  cancel(): void {
    this.requested = true;
  }

  get cancelled(): boolean {
    return this.requested;
  }
}

// ============================================================================
// Running task handle
// ============================================================================

export class TaskHandle {
  readonly token = new CancellationToken();
  private id: number | null = null;
  private current: ProgressSnapshot | null = null;
  private settled: Promise<void> = Promise.resolve();
  private readonly logLines: TaskLogEntry[] = [];
  private dropped = 0;
  private droppedSince: string | null = null;

  constructor(
    readonly kind: TaskKind,
    private readonly maxLogEntries: number
  ) {}

  get taskId(): number | null {
    return this.id;
  }

  bind(taskId: number): void {
    this.id = taskId;
  }

  publish(snapshot: ProgressSnapshot): void {
    this.current = Object.freeze({
      ...snapshot,
      counters: Object.freeze({ ...snapshot.counters }),
      errors: Object.freeze([...snapshot.errors]),
    });
  }

  snapshot(): ProgressSnapshot | null {
    return this.current;
  }

  track(worker: Promise<void>): void {
    this.settled = worker;
  }

  done(): Promise<void> {
    return this.settled;
  }

  /**
   * Keeps the newest `maxLogEntries` lines; older ones are counted in a
   * note at the head of `logs()`.
   */
  log(message: string, timestamp: string): void {
    this.logLines.push({ timestamp, message });
    while (this.logLines.length > this.maxLogEntries) {
      const oldest = this.logLines.shift();
      if (oldest === undefined) break;
      if (this.droppedSince === null) {
        this.droppedSince = oldest.timestamp;
      }
      this.dropped++;
    }
  }

  logs(): TaskLogEntry[] {
    if (this.droppedSince === null) {
      return [...this.logLines];
    }
    return [
      {
        timestamp: this.droppedSince,
        message: `${String(this.dropped)} earlier lines dropped`,
      },
      ...this.logLines,
    ];
  }
}

// ============================================================================
// Registry
// ============================================================================

export class TaskRegistry {
  private readonly active = new Map<TaskKind, TaskHandle>();

  constructor(private readonly maxLogEntries = 1000) {}

  /**
   * Claims the kind. Synchronous, so two back-to-back starts cannot both
   * pass the check.
   */
  reserve(kind: TaskKind): TaskHandle {
    const existing = this.active.get(kind);
    if (existing !== undefined) {
      throw new TaskConflictError(kind, existing.taskId);
    }
    const handle = new TaskHandle(kind, this.maxLogEntries);
    this.active.set(kind, handle);
    return handle;
  }

  release(handle: TaskHandle): void {
    if (this.active.get(handle.kind) === handle) {
      this.active.delete(handle.kind);
    }
  }

  findByTaskId(taskId: number): TaskHandle | undefined {
    for (const handle of this.active.values()) {
      if (handle.taskId === taskId) {
        return handle;
      }
    }
    return undefined;
  }

  isActive(kind: TaskKind): boolean {
    return this.active.has(kind);
  }

  list(): TaskHandle[] {
    return [...this.active.values()];
  }
}
