/**
 * Catalog Counters Route
 */

import { Type } from "@sinclair/typebox";

import { NullableString, createResponseSchema } from "../schemas/common.js";

import type { CatalogService } from "../services/catalog.service.js";
import type { FastifyInstance } from "fastify";

const CatalogStatsSchema = Type.Object({
  clubs: Type.Integer(),
  players: Type.Integer(),
  activePlayers: Type.Integer({
    description: "Players with current points or a rank",
  }),
  matches: Type.Integer(),
  competitions: Type.Integer(),
  lastScrapeAt: NullableString,
});

export function registerStatsRoutes(
  app: FastifyInstance,
  catalog: CatalogService
): void {
  // GET /stats - Row counts and last successful scrape
  app.get(
    "/stats",
    {
      schema: {
        summary: "Get catalog counters",
        description:
          "Stored clubs, players, matches and tournaments, with the finish time of the latest successful task",
        tags: ["Stats"],
        response: {
          200: createResponseSchema(CatalogStatsSchema),
        },
      },
    },
    async (_request, reply) => {
      const stats = await catalog.getStats();
      return reply.send({ data: stats });
    }
  );
}
