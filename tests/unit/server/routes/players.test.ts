import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { playerRecord } from "../../../../src/scraper/extract/records.js";
import { absent, present } from "../../../../src/types/index.js";
import { createCatalogApp, type CatalogApp } from "../../../helpers/app.js";

import type {
  MatchRecord,
  OpponentStatRecord,
} from "../../../../src/types/index.js";

function matchRecord(overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    kind: "match",
    playerLicence: "111111",
    bracket: "men",
    date: "2024-02-10",
    division: present("P1"),
    opponentClub: present("TT Other"),
    opponentName: present("MARTIN Paul"),
    opponentLicence: present("654321"),
    opponentRank: present("C4"),
    opponentPoints: present(1100),
    score: present("3-1"),
    won: present(true),
    pointsDelta: present(4.5),
    ...overrides,
  };
}

function statRecord(
  bucket: string,
  wins: number,
  bracket: OpponentStatRecord["bracket"] = "men"
): OpponentStatRecord {
  return {
    kind: "opponent-stat",
    playerLicence: "111111",
    bracket,
    bucket,
    wins,
    losses: 2,
    ratio: present(wins / (wins + 2)),
  };
}

describe("server/routes/players", () => {
  let catalog: CatalogApp;

  beforeEach(async () => {
    catalog = await createCatalogApp();
    const { store } = catalog;
    await store.merge(
      playerRecord("111111", {
        name: present("DUPONT Jean"),
        rank: present("C2"),
        category: present("SEN"),
        organizationCode: present("H004"),
        pointsStart: present(1200),
        pointsCurrent: present(1254.5),
        rankingPosition: present(87),
        totalWins: present(20),
        totalLosses: present(11),
        lastUpdate: present("2024-02-28"),
      })
    );
    await store.merge(matchRecord());
    await store.merge(
      matchRecord({
        date: "2024-01-20",
        score: present("1-3"),
        won: present(false),
        pointsDelta: present(-3),
      })
    );
    await store.merge(
      matchRecord({
        date: "2024-01-27",
        opponentLicence: present("777777"),
        opponentName: present("LAMBERT Luc"),
      })
    );
    await store.merge(
      matchRecord({
        bracket: "women",
        date: "2024-02-03",
        division: absent,
        opponentLicence: absent,
        opponentName: present("DURAND Anne"),
      })
    );
    await store.merge(statRecord("D0", 5));
    await store.merge(statRecord("B4", 1));
    await store.merge(statRecord("C2", 3));
    await store.merge(statRecord("E6", 2, "women"));
  });

  afterEach(async () => {
    await catalog.close();
  });

  describe("GET /api/v1/players/:licence", () => {
    it("should return the player sheet", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({
        licence: "111111",
        name: "DUPONT Jean",
        rank: "C2",
        category: "SEN",
        clubCode: "H004",
        points: { start: 1200, current: 1254.5 },
        rankingPosition: 87,
        totalWins: 20,
        totalLosses: 11,
        women: null,
        lastUpdate: "2024-02-28",
        updatedAt: "2024-03-01T10:00:00.000Z",
      });
    });

    it("should include the women's sheet once one was merged", async () => {
      await catalog.store.merge(
        playerRecord("111111", {
          womenRank: present("E2"),
          womenTotalWins: present(4),
        })
      );

      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111",
      });

      expect(response.json().data.women).toEqual({
        rank: "E2",
        pointsStart: null,
        pointsCurrent: null,
        totalWins: 4,
        totalLosses: null,
      });
    });

    it("should return 404 for an unknown player", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/999999",
      });

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe("Player 999999 not found");
    });
  });

  describe("GET /api/v1/players/:licence/matches", () => {
    it("should list matches newest first", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/matches",
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{ data: Array<{ date: string }> }>();
      expect(body.data.map((match) => match.date)).toEqual([
        "2024-02-10",
        "2024-02-03",
        "2024-01-27",
        "2024-01-20",
      ]);
    });

    it("should filter by bracket and shape each match", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/matches?bracket=women",
      });

      expect(response.json().data).toEqual([
        {
          key: expect.stringMatching(/^[0-9a-f]{64}$/),
          bracket: "women",
          date: "2024-02-03",
          division: null,
          opponent: {
            licence: null,
            name: "DURAND Anne",
            club: "TT Other",
            rank: "C4",
            points: 1100,
          },
          score: "3-1",
          won: true,
          pointsDelta: 4.5,
        },
      ]);
    });

    it("should apply the limit", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/matches?limit=1",
      });

      const body = response.json<{ data: Array<{ date: string }> }>();
      expect(body.data.map((match) => match.date)).toEqual(["2024-02-10"]);
    });

    it("should reject an unknown bracket", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/matches?bracket=mixed",
      });

      expect(response.statusCode).toBe(400);
    });

    it("should return 404 for an unknown player", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/999999/matches",
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe("GET /api/v1/players/:licence/stats", () => {
    it("should order men's buckets strongest first", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/stats?bracket=men",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        { bracket: "men", bucket: "B4", wins: 1, losses: 2, ratio: 1 / 3 },
        { bracket: "men", bucket: "C2", wins: 3, losses: 2, ratio: 0.6 },
        { bracket: "men", bucket: "D0", wins: 5, losses: 2, ratio: 5 / 7 },
      ]);
    });

    it("should list both brackets without a filter", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/stats",
      });

      const body = response.json<{ data: Array<{ bracket: string; bucket: string }> }>();
      expect(body.data.map((stat) => `${stat.bracket}:${stat.bucket}`)).toEqual([
        "men:B4",
        "men:C2",
        "men:D0",
        "women:E6",
      ]);
    });
  });

  describe("GET /api/v1/players/:licence/head-to-head/:opponent", () => {
    it("should summarize the matches against one opponent", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/head-to-head/654321",
      });

      expect(response.statusCode).toBe(200);
      const body = response.json<{
        data: {
          playerLicence: string;
          opponentLicence: string;
          played: number;
          wins: number;
          losses: number;
          matches: Array<{ date: string; won: boolean }>;
        };
      }>();
      expect(body.data).toMatchObject({
        playerLicence: "111111",
        opponentLicence: "654321",
        played: 2,
        wins: 1,
        losses: 1,
      });
      expect(body.data.matches.map((match) => [match.date, match.won])).toEqual([
        ["2024-02-10", true],
        ["2024-01-20", false],
      ]);
    });

    it("should report an empty record for an opponent never met", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players/111111/head-to-head/000001",
      });

      expect(response.json().data).toEqual({
        playerLicence: "111111",
        opponentLicence: "000001",
        played: 0,
        wins: 0,
        losses: 0,
        matches: [],
      });
    });
  });

  describe("GET /api/v1/players", () => {
    beforeEach(async () => {
      await catalog.store.merge(
        playerRecord("222222", {
          name: present("MARTIN Paul"),
          rank: present("C4"),
          organizationCode: present("H004"),
          pointsCurrent: present(1100),
        })
      );
      await catalog.store.merge(
        playerRecord("333333", {
          name: present("LAMBERT Luc"),
          organizationCode: present("H010"),
        })
      );
    });

    async function licences(url: string): Promise<string[]> {
      const response = await catalog.app.inject({ method: "GET", url });
      expect(response.statusCode).toBe(200);
      return response
        .json<{ data: Array<{ licence: string }> }>()
        .data.map((item) => item.licence);
    }

    it("should list players by current points with unrated players last", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players",
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.data).toEqual([
        {
          licence: "111111",
          name: "DUPONT Jean",
          rank: "C2",
          category: "SEN",
          clubCode: "H004",
          pointsCurrent: 1254.5,
        },
        {
          licence: "222222",
          name: "MARTIN Paul",
          rank: "C4",
          category: null,
          clubCode: "H004",
          pointsCurrent: 1100,
        },
        {
          licence: "333333",
          name: "LAMBERT Luc",
          rank: null,
          category: null,
          clubCode: "H010",
          pointsCurrent: null,
        },
      ]);
      expect(body.meta.pagination).toEqual({
        limit: 100,
        offset: 0,
        hasMore: false,
        nextOffset: null,
      });
    });

    it("should filter by club code in any case", async () => {
      expect(await licences("/api/v1/players?club=h004")).toEqual([
        "111111",
        "222222",
      ]);
    });

    it("should filter by rank and points range", async () => {
      expect(await licences("/api/v1/players?rank=C4")).toEqual(["222222"]);
      expect(await licences("/api/v1/players?minPoints=1150")).toEqual([
        "111111",
      ]);
      expect(await licences("/api/v1/players?maxPoints=1200")).toEqual([
        "222222",
      ]);
    });

    it("should search in name and licence", async () => {
      expect(await licences("/api/v1/players?q=martin")).toEqual(["222222"]);
      expect(await licences("/api/v1/players?q=3333")).toEqual(["333333"]);
    });

    it("should page with limit and offset", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/players?limit=1&offset=1",
      });

      const body = response.json<{
        data: Array<{ licence: string }>;
        meta: { pagination: unknown };
      }>();
      expect(body.data.map((item) => item.licence)).toEqual(["222222"]);
      expect(body.meta.pagination).toEqual({
        limit: 1,
        offset: 1,
        hasMore: true,
        nextOffset: 2,
      });
    });
  });
});
