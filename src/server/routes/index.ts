/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { registerClubRoutes } from "./clubs.js";
import { registerCompetitionRoutes } from "./competitions.js";
import { registerPlayerRoutes } from "./players.js";
import { registerScrapeRoutes } from "./scrape.js";
import { registerStatsRoutes } from "./stats.js";
import { CatalogService } from "../services/catalog.service.js";

import type { ReconciliationStore } from "../../services/store/reconciliation.js";
import type { TaskOrchestrator } from "../../services/tasks/orchestrator.js";
import type { FastifyInstance } from "fastify";

export interface ApiDeps {
  store: ReconciliationStore;
  orchestrator: TaskOrchestrator;
}

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
  },
  {
    examples: [{ status: "ok" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    () => ({ status: "ok" as const })
  );

  const catalog = new CatalogService(deps.store);

  // API v1 routes
  await app.register(
    (api) => {
      // Background tasks
      registerScrapeRoutes(api, { orchestrator: deps.orchestrator });

      // Catalog reads
      registerClubRoutes(api, catalog);
      registerPlayerRoutes(api, catalog);
      registerCompetitionRoutes(api, catalog);
      registerStatsRoutes(api, catalog);
    },
    { prefix: "/api/v1" }
  );
}
