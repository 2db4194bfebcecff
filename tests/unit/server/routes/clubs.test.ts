import { afterEach, beforeEach, describe, it, expect } from "vitest";

import {
  organizationRecord,
  playerRecord,
} from "../../../../src/scraper/extract/records.js";
import { present } from "../../../../src/types/index.js";
import { createCatalogApp, type CatalogApp } from "../../../helpers/app.js";

describe("server/routes/clubs", () => {
  let catalog: CatalogApp;

  beforeEach(async () => {
    catalog = await createCatalogApp();
    const { store } = catalog;
    await store.merge(
      organizationRecord("H004", {
        name: present("TT Mons"),
        email: present("contact@example.org"),
        hasShower: present(true),
        venueName: present("Salle Omnisports"),
        venueAccessible: present(false),
        teamsMen: present(6),
        teamsWomen: present(2),
        palette: present("Palette d'or"),
      })
    );
    await store.merge(organizationRecord("H010", { name: present("CTT Charleroi") }));
    await store.merge(organizationRecord("N051", { name: present("TT Namur") }));
    await store.merge(
      playerRecord("222222", {
        name: present("MARTIN Paul"),
        rank: present("D4"),
        category: present("SEN"),
        organizationCode: present("H004"),
      })
    );
    await store.merge(
      playerRecord("111111", {
        name: present("DUPONT Jean"),
        rank: present("C2"),
        category: present("V40"),
        organizationCode: present("H004"),
      })
    );
    await store.merge(
      playerRecord("333333", {
        name: present("LAMBERT Luc"),
        organizationCode: present("N051"),
      })
    );
  });

  afterEach(async () => {
    await catalog.close();
  });

  describe("GET /api/v1/clubs", () => {
    it("should list clubs ordered by code", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        data: [
          { code: "H004", name: "TT Mons", region: "Hainaut" },
          { code: "H010", name: "CTT Charleroi", region: "Hainaut" },
          { code: "N051", name: "TT Namur", region: "Namur" },
        ],
        meta: {
          pagination: { limit: 50, offset: 0, hasMore: false, nextOffset: null },
        },
      });
    });

    it("should filter by region", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs?region=Namur",
      });

      const body = response.json<{ data: Array<{ code: string }> }>();
      expect(body.data.map((club) => club.code)).toEqual(["N051"]);
    });

    it("should search code and name without regard to case", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs?q=charleroi",
      });

      const body = response.json<{ data: Array<{ code: string }> }>();
      expect(body.data.map((club) => club.code)).toEqual(["H010"]);
    });

    it("should page with limit and offset", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs?limit=2&offset=0",
      });

      const body = response.json<{
        data: Array<{ code: string }>;
        meta: { pagination: unknown };
      }>();
      expect(body.data.map((club) => club.code)).toEqual(["H004", "H010"]);
      expect(body.meta.pagination).toEqual({
        limit: 2,
        offset: 0,
        hasMore: true,
        nextOffset: 2,
      });
    });

    it("should reject a negative offset", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs?offset=-1",
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe("GET /api/v1/clubs/regions", () => {
    it("should count clubs per region", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs/regions",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        { region: "Hainaut", clubCount: 2 },
        { region: "Namur", clubCount: 1 },
      ]);
    });
  });

  describe("GET /api/v1/clubs/:code", () => {
    it("should return club details", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs/H004",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({
        code: "H004",
        name: "TT Mons",
        region: "Hainaut",
        fullName: null,
        email: "contact@example.org",
        phone: null,
        legalStatus: null,
        website: null,
        hasShower: true,
        venue: {
          name: "Salle Omnisports",
          address: null,
          phone: null,
          accessible: false,
          remarks: null,
        },
        teams: { men: 6, women: 2, youth: null, veterans: null },
        label: null,
        palette: "Palette d'or",
        updatedAt: "2024-03-01T10:00:00.000Z",
      });
    });

    it("should return 404 for an unknown club", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs/X999",
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Club X999 not found",
      });
    });
  });

  describe("GET /api/v1/clubs/:code/players", () => {
    it("should list members ordered by name", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs/H004/players",
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual([
        {
          licence: "111111",
          name: "DUPONT Jean",
          rank: "C2",
          category: "V40",
          clubCode: "H004",
        },
        {
          licence: "222222",
          name: "MARTIN Paul",
          rank: "D4",
          category: "SEN",
          clubCode: "H004",
        },
      ]);
    });

    it("should return 404 for an unknown club", async () => {
      const response = await catalog.app.inject({
        method: "GET",
        url: "/api/v1/clubs/X999/players",
      });

      expect(response.statusCode).toBe(404);
    });
  });
});
