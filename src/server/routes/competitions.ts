/**
 * Competition API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  IdParamSchema,
  NullableNumber,
  NullableString,
  PaginationMetaSchema,
  createListResponseSchema,
  createResponseSchema,
  type IdParam,
} from "../schemas/common.js";

import type { CatalogService } from "../services/catalog.service.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const CompetitionsQuerySchema = Type.Object({
  from: Type.Optional(
    Type.String({
      pattern: "^\\d{4}-\\d{2}-\\d{2}$",
      description: "Only tournaments starting on or after this date",
    })
  ),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, default: 50 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

type CompetitionsQuery = Static<typeof CompetitionsQuerySchema>;

const CompetitionSummarySchema = Type.Object({
  id: Type.String(),
  name: NullableString,
  level: NullableString,
  dateStart: NullableString,
  dateEnd: NullableString,
  reference: NullableString,
  seriesCount: NullableNumber,
});

const CompetitionDetailSchema = Type.Composite([
  CompetitionSummarySchema,
  Type.Object({
    series: Type.Array(
      Type.Object({
        name: Type.String(),
        date: NullableString,
        startTime: NullableString,
        entries: NullableNumber,
        maxEntries: NullableNumber,
      })
    ),
    registrations: Type.Array(
      Type.Object({
        series: Type.String(),
        licence: Type.String(),
        playerName: NullableString,
        clubName: NullableString,
        rank: NullableString,
      })
    ),
  }),
]);

const CompetitionListResponseSchema = Type.Object({
  data: Type.Array(CompetitionSummarySchema),
  meta: Type.Object({
    pagination: PaginationMetaSchema,
  }),
});

// ============================================================================
// Route Registration
// ============================================================================

export function registerCompetitionRoutes(
  app: FastifyInstance,
  catalog: CatalogService
): void {
  // GET /competitions - Tournament calendar
  app.get<{ Querystring: CompetitionsQuery }>(
    "/competitions",
    {
      schema: {
        summary: "List tournaments",
        description: "Tournaments ordered by start date",
        tags: ["Competitions"],
        querystring: CompetitionsQuerySchema,
        response: {
          200: CompetitionListResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const result = await catalog.listCompetitions(request.query);
      return reply.send({
        data: result.items,
        meta: { pagination: result.pagination },
      });
    }
  );

  // GET /competitions/levels - Distinct tournament levels
  app.get(
    "/competitions/levels",
    {
      schema: {
        summary: "List tournament levels",
        description: "Distinct levels of the stored tournaments, sorted",
        tags: ["Competitions"],
        response: {
          200: createListResponseSchema(Type.String()),
        },
      },
    },
    async (_request, reply) => {
      const levels = await catalog.listCompetitionLevels();
      return reply.send({ data: levels });
    }
  );

  // GET /competitions/:id - Tournament with series and registrations
  app.get<{ Params: IdParam }>(
    "/competitions/:id",
    {
      schema: {
        summary: "Get tournament",
        description: "Tournament details with its series and registered players",
        tags: ["Competitions"],
        params: IdParamSchema,
        response: {
          200: createResponseSchema(CompetitionDetailSchema),
        },
      },
    },
    async (request, reply) => {
      const competition = await catalog.getCompetition(request.params.id);
      return reply.send({ data: competition });
    }
  );
}
