/**
 * Scrape API Routes
 *
 * Start scrape tasks in the background, poll their progress and logs,
 * cancel them and browse past runs.
 */

import { Type, type Static } from "@sinclair/typebox";

import { ConflictError, NotFoundError } from "../plugins/error-handler.js";
import {
  TaskKindSchema,
  TaskStatusSchema,
  TaskTriggerSchema,
  createListResponseSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { TaskOrchestrator } from "../../services/tasks/orchestrator.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const KindParamsSchema = Type.Object({
  kind: TaskKindSchema,
});

type KindParams = Static<typeof KindParamsSchema>;

const TaskIdParamsSchema = Type.Object({
  taskId: Type.Integer({ minimum: 1 }),
});

type TaskIdParams = Static<typeof TaskIdParamsSchema>;

const HistoryQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 200, default: 20 })),
});

type HistoryQuery = Static<typeof HistoryQuerySchema>;

const CountersSchema = Type.Record(Type.String(), Type.Integer());

const TaskStartedSchema = Type.Object({
  taskId: Type.Integer(),
  kind: TaskKindSchema,
  status: TaskStatusSchema,
});

const TaskStatusSchemaView = Type.Object({
  id: Type.Integer(),
  kind: TaskKindSchema,
  status: TaskStatusSchema,
  trigger: TaskTriggerSchema,
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
  totals: Type.Object({
    total: Type.Integer(),
    completed: Type.Integer(),
    perEntity: CountersSchema,
  }),
  currentUnit: Type.Union([Type.String(), Type.Null()]),
  errorCount: Type.Integer(),
  errors: Type.Array(Type.String()),
});

const TaskSummarySchema = Type.Object({
  id: Type.Integer(),
  kind: TaskKindSchema,
  status: TaskStatusSchema,
  trigger: TaskTriggerSchema,
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Type.Union([Type.String({ format: "date-time" }), Type.Null()]),
  totalUnits: Type.Integer(),
  completedUnits: Type.Integer(),
  errorCount: Type.Integer(),
});

const CancelResultSchema = Type.Object({
  taskId: Type.Integer(),
  result: Type.Literal("acknowledged"),
});

const LogEntrySchema = Type.Object({
  timestamp: Type.String({ format: "date-time" }),
  message: Type.String(),
});

// ============================================================================
// Route Registration
// ============================================================================

export interface ScrapeRouteDeps {
  orchestrator: TaskOrchestrator;
}

export function registerScrapeRoutes(
  app: FastifyInstance,
  { orchestrator }: ScrapeRouteDeps
): void {
  // POST /scrape/:kind - Start a scrape task
  app.post<{ Params: KindParams }>(
    "/scrape/:kind",
    {
      schema: {
        summary: "Start a scrape task",
        description:
          "Starts a background task of the given kind and returns its id at once. Only one task per kind may run at a time; a second start returns 409 with the active task id.",
        tags: ["Scrape"],
        params: KindParamsSchema,
        response: {
          202: createResponseSchema(TaskStartedSchema),
        },
      },
    },
    async (request, reply) => {
      const { kind } = request.params;
      const taskId = await orchestrator.start(kind, "manual");

      return reply.status(202).send({
        data: { taskId, kind, status: "running" as const },
      });
    }
  );

  // GET /scrape/tasks/:taskId - Task progress
  app.get<{ Params: TaskIdParams }>(
    "/scrape/tasks/:taskId",
    {
      schema: {
        summary: "Get task status",
        description:
          "Returns the live progress of a running task, or the final state of a finished one",
        tags: ["Scrape"],
        params: TaskIdParamsSchema,
        response: {
          200: createResponseSchema(TaskStatusSchemaView),
        },
      },
    },
    async (request, reply) => {
      const { taskId } = request.params;
      const status = await orchestrator.status(taskId);
      if (status === null) {
        throw new NotFoundError(`Task ${String(taskId)} not found`);
      }
      return reply.send({ data: status });
    }
  );

  // POST /scrape/tasks/:taskId/cancel - Request cancellation
  app.post<{ Params: TaskIdParams }>(
    "/scrape/tasks/:taskId/cancel",
    {
      schema: {
        summary: "Cancel a task",
        description:
          "Asks a running task to stop. The unit in progress still completes; the task then ends as cancelled.",
        tags: ["Scrape"],
        params: TaskIdParamsSchema,
        response: {
          200: createResponseSchema(CancelResultSchema),
        },
      },
    },
    async (request, reply) => {
      const { taskId } = request.params;
      const result = orchestrator.cancel(taskId);

      if (result === "not-running") {
        const status = await orchestrator.status(taskId);
        if (status === null) {
          throw new NotFoundError(`Task ${String(taskId)} not found`);
        }
        throw new ConflictError(`Task ${String(taskId)} is not running`, {
          status: status.status,
        });
      }

      return reply.send({ data: { taskId, result } });
    }
  );

  // GET /scrape/tasks/:taskId/logs - Task log lines
  app.get<{ Params: TaskIdParams }>(
    "/scrape/tasks/:taskId/logs",
    {
      schema: {
        summary: "Get task logs",
        description:
          "Returns the task's log lines in order. Lines keep growing while the task runs.",
        tags: ["Scrape"],
        params: TaskIdParamsSchema,
        response: {
          200: createListResponseSchema(LogEntrySchema),
        },
      },
    },
    async (request, reply) => {
      const { taskId } = request.params;
      if ((await orchestrator.status(taskId)) === null) {
        throw new NotFoundError(`Task ${String(taskId)} not found`);
      }
      const logs = await orchestrator.logs(taskId);
      return reply.send({ data: logs });
    }
  );

  // GET /scrape/history - Recent tasks
  app.get<{ Querystring: HistoryQuery }>(
    "/scrape/history",
    {
      schema: {
        summary: "List recent tasks",
        description: "Returns the most recent tasks, newest first",
        tags: ["Scrape"],
        querystring: HistoryQuerySchema,
        response: {
          200: createListResponseSchema(TaskSummarySchema),
        },
      },
    },
    async (request, reply) => {
      const { limit = 20 } = request.query;
      const tasks = await orchestrator.history(limit);

      return reply.send({
        data: tasks.map((task) => ({
          id: task.id,
          kind: task.kind,
          status: task.status,
          trigger: task.trigger,
          startedAt: task.startedAt,
          finishedAt: task.finishedAt,
          totalUnits: task.totalUnits,
          completedUnits: task.completedUnits,
          errorCount: task.errors.length,
        })),
      });
    }
  );
}
