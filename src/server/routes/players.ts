/**
 * Player API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { PlayerSummarySchema } from "./clubs.js";
import {
  BracketSchema,
  LicenceParamSchema,
  NullableBoolean,
  NullableNumber,
  NullableString,
  PaginationMetaSchema,
  createListResponseSchema,
  createResponseSchema,
  type LicenceParam,
} from "../schemas/common.js";

import type { CatalogService } from "../services/catalog.service.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const PlayersQuerySchema = Type.Object({
  club: Type.Optional(Type.String({ description: "Club code, e.g. H004" })),
  rank: Type.Optional(Type.String({ description: "Rank, e.g. C2" })),
  minPoints: Type.Optional(Type.Number()),
  maxPoints: Type.Optional(Type.Number()),
  q: Type.Optional(Type.String({ description: "Search in licence and name" })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000, default: 100 })),
  offset: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
});

type PlayersQuery = Static<typeof PlayersQuerySchema>;

const PlayerListResponseSchema = Type.Object({
  data: Type.Array(
    Type.Composite([
      PlayerSummarySchema,
      Type.Object({ pointsCurrent: NullableNumber }),
    ])
  ),
  meta: Type.Object({
    pagination: PaginationMetaSchema,
  }),
});

const PlayerDetailSchema = Type.Composite([
  PlayerSummarySchema,
  Type.Object({
    points: Type.Object({
      start: NullableNumber,
      current: NullableNumber,
    }),
    rankingPosition: NullableNumber,
    totalWins: NullableNumber,
    totalLosses: NullableNumber,
    women: Type.Union([
      Type.Object({
        rank: NullableString,
        pointsStart: NullableNumber,
        pointsCurrent: NullableNumber,
        totalWins: NullableNumber,
        totalLosses: NullableNumber,
      }),
      Type.Null(),
    ]),
    lastUpdate: NullableString,
    updatedAt: Type.String(),
  }),
]);

const MatchSchema = Type.Object({
  key: Type.String(),
  bracket: Type.String(),
  date: Type.String(),
  division: NullableString,
  opponent: Type.Object({
    licence: NullableString,
    name: NullableString,
    club: NullableString,
    rank: NullableString,
    points: NullableNumber,
  }),
  score: NullableString,
  won: NullableBoolean,
  pointsDelta: NullableNumber,
});

const OpponentStatSchema = Type.Object({
  bracket: Type.String(),
  bucket: Type.String(),
  wins: Type.Integer(),
  losses: Type.Integer(),
  ratio: NullableNumber,
});

const HeadToHeadSchema = Type.Object({
  playerLicence: Type.String(),
  opponentLicence: Type.String(),
  played: Type.Integer(),
  wins: Type.Integer(),
  losses: Type.Integer(),
  matches: Type.Array(MatchSchema),
});

const MatchesQuerySchema = Type.Object({
  bracket: Type.Optional(BracketSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500, default: 100 })),
});

type MatchesQuery = Static<typeof MatchesQuerySchema>;

const StatsQuerySchema = Type.Object({
  bracket: Type.Optional(BracketSchema),
});

type StatsQuery = Static<typeof StatsQuerySchema>;

const HeadToHeadParamsSchema = Type.Object({
  licence: Type.String(),
  opponent: Type.String(),
});

type HeadToHeadParams = Static<typeof HeadToHeadParamsSchema>;

// ============================================================================
// Route Registration
// ============================================================================

export function registerPlayerRoutes(
  app: FastifyInstance,
  catalog: CatalogService
): void {
  // GET /players - Players by current points
  app.get<{ Querystring: PlayersQuery }>(
    "/players",
    {
      schema: {
        summary: "List players",
        description:
          "Players ordered by current points, optionally filtered by club, rank, points or search text",
        tags: ["Players"],
        querystring: PlayersQuerySchema,
        response: {
          200: PlayerListResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { club, rank, minPoints, maxPoints, q, limit, offset } =
        request.query;
      const result = await catalog.listPlayers({
        clubCode: club?.toUpperCase(),
        rank,
        minPoints,
        maxPoints,
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

  // GET /players/:licence - Player sheet
  app.get<{ Params: LicenceParam }>(
    "/players/:licence",
    {
      schema: {
        summary: "Get player",
        description: "Player identity, points and totals for both brackets",
        tags: ["Players"],
        params: LicenceParamSchema,
        response: {
          200: createResponseSchema(PlayerDetailSchema),
        },
      },
    },
    async (request, reply) => {
      const player = await catalog.getPlayer(request.params.licence);
      return reply.send({ data: player });
    }
  );

  // GET /players/:licence/matches - Match history
  app.get<{ Params: LicenceParam; Querystring: MatchesQuery }>(
    "/players/:licence/matches",
    {
      schema: {
        summary: "List player matches",
        description: "Matches of the player, newest first",
        tags: ["Players"],
        params: LicenceParamSchema,
        querystring: MatchesQuerySchema,
        response: {
          200: createListResponseSchema(MatchSchema),
        },
      },
    },
    async (request, reply) => {
      const { bracket, limit } = request.query;
      const matches = await catalog.listMatches(request.params.licence, {
        bracket,
        limit,
      });
      return reply.send({ data: matches });
    }
  );

  // GET /players/:licence/stats - Results by opponent rank
  app.get<{ Params: LicenceParam; Querystring: StatsQuery }>(
    "/players/:licence/stats",
    {
      schema: {
        summary: "Get opponent statistics",
        description:
          "Wins and losses per opponent rank, strongest rank first",
        tags: ["Players"],
        params: LicenceParamSchema,
        querystring: StatsQuerySchema,
        response: {
          200: createListResponseSchema(OpponentStatSchema),
        },
      },
    },
    async (request, reply) => {
      const stats = await catalog.listOpponentStats(
        request.params.licence,
        request.query.bracket
      );
      return reply.send({ data: stats });
    }
  );

  // GET /players/:licence/head-to-head/:opponent - Record against one opponent
  app.get<{ Params: HeadToHeadParams }>(
    "/players/:licence/head-to-head/:opponent",
    {
      schema: {
        summary: "Get head-to-head record",
        description: "All stored matches of the player against one opponent",
        tags: ["Players"],
        params: HeadToHeadParamsSchema,
        response: {
          200: createResponseSchema(HeadToHeadSchema),
        },
      },
    },
    async (request, reply) => {
      const { licence, opponent } = request.params;
      const summary = await catalog.getHeadToHead(licence, opponent);
      return reply.send({ data: summary });
    }
  );
}
