/**
 * Club API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  CodeParamSchema,
  NullableBoolean,
  NullableNumber,
  NullableString,
  PaginationMetaSchema,
  createListResponseSchema,
  createResponseSchema,
  type CodeParam,
} from "../schemas/common.js";

import type { CatalogService } from "../services/catalog.service.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ClubsQuerySchema = Type.Object({
  region: Type.Optional(Type.String({ description: "Region name, e.g. Hainaut" })),
  q: Type.Optional(Type.String({ description: "Search in code and name" })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, default: 50 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

type ClubsQuery = Static<typeof ClubsQuerySchema>;

const ClubSummarySchema = Type.Object({
  code: Type.String(),
  name: NullableString,
  region: NullableString,
});

export const ClubDetailSchema = Type.Object({
  code: Type.String(),
  name: NullableString,
  region: NullableString,
  fullName: NullableString,
  email: NullableString,
  phone: NullableString,
  legalStatus: NullableString,
  website: NullableString,
  hasShower: NullableBoolean,
  venue: Type.Object({
    name: NullableString,
    address: NullableString,
    phone: NullableString,
    accessible: NullableBoolean,
    remarks: NullableString,
  }),
  teams: Type.Object({
    men: NullableNumber,
    women: NullableNumber,
    youth: NullableNumber,
    veterans: NullableNumber,
  }),
  label: NullableString,
  palette: NullableString,
  updatedAt: Type.String(),
});

const RegionSchema = Type.Object({
  region: Type.String(),
  clubCount: Type.Integer(),
});

export const PlayerSummarySchema = Type.Object({
  licence: Type.String(),
  name: NullableString,
  rank: NullableString,
  category: NullableString,
  clubCode: NullableString,
});

const ClubListResponseSchema = Type.Object({
  data: Type.Array(ClubSummarySchema),
  meta: Type.Object({
    pagination: PaginationMetaSchema,
  }),
});

// ============================================================================
// Route Registration
// ============================================================================

export function registerClubRoutes(
  app: FastifyInstance,
  catalog: CatalogService
): void {
  // GET /clubs - List clubs
  app.get<{ Querystring: ClubsQuery }>(
    "/clubs",
    {
      schema: {
        summary: "List clubs",
        description: "Lists clubs ordered by code, optionally filtered by region or search text",
        tags: ["Clubs"],
        querystring: ClubsQuerySchema,
        response: {
          200: ClubListResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { region, q, limit, offset } = request.query;
      const result = await catalog.listClubs({
        region,
        search: q,
        limit,
        offset,
      });
      return reply.send({
        data: result.items,
        meta: { pagination: result.pagination },
      });
    }
  );

  // GET /clubs/regions - Regions with club counts
  app.get(
    "/clubs/regions",
    {
      schema: {
        summary: "List regions",
        description: "Regions with the number of clubs in each",
        tags: ["Clubs"],
        response: {
          200: createListResponseSchema(RegionSchema),
        },
      },
    },
    async (_request, reply) => {
      const regions = await catalog.listRegions();
      return reply.send({ data: regions });
    }
  );

  // GET /clubs/:code - Club details
  app.get<{ Params: CodeParam }>(
    "/clubs/:code",
    {
      schema: {
        summary: "Get club",
        description: "Club details, venue and team counts",
        tags: ["Clubs"],
        params: CodeParamSchema,
        response: {
          200: createResponseSchema(ClubDetailSchema),
        },
      },
    },
    async (request, reply) => {
      const club = await catalog.getClub(request.params.code);
      return reply.send({ data: club });
    }
  );

  // GET /clubs/:code/players - Club members
  app.get<{ Params: CodeParam }>(
    "/clubs/:code/players",
    {
      schema: {
        summary: "List club members",
        description: "Players whose club is the given one, ordered by name",
        tags: ["Clubs"],
        params: CodeParamSchema,
        response: {
          200: createListResponseSchema(PlayerSummarySchema),
        },
      },
    },
    async (request, reply) => {
      const players = await catalog.listClubPlayers(request.params.code);
      return reply.send({ data: players });
    }
  );
}
