import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { buildApp } from "../../../../src/server/app.js";
import { ReconciliationStore } from "../../../../src/services/store/reconciliation.js";
import { TaskLedger } from "../../../../src/services/tasks/ledger.js";
import { TaskOrchestrator } from "../../../../src/services/tasks/orchestrator.js";
import { clubListPage, clubPage } from "../../../fixtures/pages.js";
import { createTestDatabase } from "../../../helpers/db.js";
import {
  createUpstream,
  deferred,
  html,
  testSettings,
} from "../../../helpers/upstream.js";

import type { Database } from "../../../../src/db/types.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

const club = { code: "H004", name: "TT Mons" };

describe("server/routes/scrape", () => {
  let db: Kysely<Database>;
  let app: FastifyInstance;
  let orchestrator: TaskOrchestrator;
  let gate: ReturnType<typeof deferred>;

  beforeEach(async () => {
    db = await createTestDatabase();
    gate = deferred();
    const { client } = createUpstream(async ({ path }) => {
      if (path === "/interclubs/rankings.php") {
        return html(clubListPage([club]));
      }
      await gate.promise;
      return html(
        clubPage(club, [
          { licence: "1004", name: "PLAYER 1004", category: "SEN", rank: "E6" },
        ])
      );
    });
    const store = new ReconciliationStore(db);
    orchestrator = new TaskOrchestrator({
      store,
      ledger: new TaskLedger(db),
      client,
      settings: testSettings,
      sleep: async () => {},
    });
    app = await buildApp({ store, orchestrator });
    await app.ready();
  });

  afterEach(async () => {
    gate.resolve();
    for (const taskId of [1, 2, 3]) {
      await orchestrator.waitFor(taskId);
    }
    await app.close();
    await db.destroy();
  });

  async function startTask(): Promise<number> {
    const response = await app.inject({
      method: "POST",
      url: "/api/v1/scrape/organizations",
    });
    expect(response.statusCode).toBe(202);
    const body = response.json<{ data: { taskId: number } }>();
    return body.data.taskId;
  }

  describe("POST /api/v1/scrape/:kind", () => {
    it("should start a task and answer at once", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/scrape/organizations",
      });

      expect(response.statusCode).toBe(202);
      const body = response.json();
      expect(body.data).toEqual({
        taskId: 1,
        kind: "organizations",
        status: "running",
      });
    });

    it("should return 409 while a task of the same kind runs", async () => {
      const taskId = await startTask();

      const response = await app.inject({
        method: "POST",
        url: "/api/v1/scrape/organizations",
      });

      expect(response.statusCode).toBe(409);
      const body = response.json();
      expect(body.error).toBe("CONFLICT");
      expect(body.details).toEqual({
        kind: "organizations",
        activeTaskId: taskId,
      });
    });

    it("should reject unknown task kinds", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/scrape/players",
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe("VALIDATION_ERROR");
    });
  });

  describe("GET /api/v1/scrape/tasks/:taskId", () => {
    it("should report live progress, then the final state", async () => {
      const taskId = await startTask();

      const running = await app.inject({
        method: "GET",
        url: `/api/v1/scrape/tasks/${String(taskId)}`,
      });
      expect(running.statusCode).toBe(200);
      expect(running.json().data).toMatchObject({
        id: taskId,
        kind: "organizations",
        status: "running",
        trigger: "manual",
        finishedAt: null,
      });

      gate.resolve();
      await orchestrator.waitFor(taskId);

      const finished = await app.inject({
        method: "GET",
        url: `/api/v1/scrape/tasks/${String(taskId)}`,
      });
      expect(finished.json().data).toMatchObject({
        status: "success",
        totals: {
          total: 1,
          completed: 1,
          perEntity: { organization: 2, player: 1 },
        },
        currentUnit: null,
        errorCount: 0,
        errors: [],
      });
    });

    it("should return 404 for an unknown task", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/scrape/tasks/999",
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe("Task 999 not found");
    });

    it("should reject a non-numeric task id", async () => {
      const response = await app.inject({
        method: "GET",
        url: "/api/v1/scrape/tasks/abc",
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe("POST /api/v1/scrape/tasks/:taskId/cancel", () => {
    it("should acknowledge cancellation of a running task", async () => {
      const taskId = await startTask();

      const response = await app.inject({
        method: "POST",
        url: `/api/v1/scrape/tasks/${String(taskId)}/cancel`,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({ taskId, result: "acknowledged" });

      gate.resolve();
      await orchestrator.waitFor(taskId);
      expect((await orchestrator.status(taskId))?.status).toBe("cancelled");
    });

    it("should return 409 for a finished task", async () => {
      gate.resolve();
      const taskId = await startTask();
      await orchestrator.waitFor(taskId);

      const response = await app.inject({
        method: "POST",
        url: `/api/v1/scrape/tasks/${String(taskId)}/cancel`,
      });

      expect(response.statusCode).toBe(409);
      const body = response.json();
      expect(body.message).toBe(`Task ${String(taskId)} is not running`);
      expect(body.details).toEqual({ status: "success" });
    });

    it("should return 404 for an unknown task", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/v1/scrape/tasks/42/cancel",
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe("GET /api/v1/scrape/tasks/:taskId/logs", () => {
    it("should return the task's log lines", async () => {
      gate.resolve();
      const taskId = await startTask();
      await orchestrator.waitFor(taskId);

      const response = await app.inject({
        method: "GET",
        url: `/api/v1/scrape/tasks/${String(taskId)}/logs`,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ data: Array<{ message: string }> }>();
      expect(body.data.map((entry) => entry.message)).toEqual([
        "Started organizations task (manual)",
        "Found 1 organizations",
        "Finished as success: 1/1 units, 0 errors",
      ]);
    });
  });

  describe("GET /api/v1/scrape/history", () => {
    it("should list recent tasks newest first", async () => {
      gate.resolve();
      const first = await startTask();
      await orchestrator.waitFor(first);
      const second = await startTask();
      await orchestrator.waitFor(second);

      const response = await app.inject({
        method: "GET",
        url: "/api/v1/scrape/history?limit=1",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        expect.objectContaining({
          id: second,
          kind: "organizations",
          status: "success",
          totalUnits: 1,
          completedUnits: 1,
          errorCount: 0,
        }),
      ]);
    });
  });
});
