import { describe, it, expect } from "vitest";

import {
  extract,
  extractPageCount,
  ExtractionError,
} from "../../../../src/scraper/extract/index.js";
import { absent, present } from "../../../../src/types/index.js";
import {
  competitionListPage,
  registrationsPage,
  seriesPage,
} from "../../../fixtures/pages.js";

describe("scraper/extract/competitions", () => {
  describe("competition list", () => {
    const page = competitionListPage(
      [
        {
          id: "101",
          name: "Tournoi de Mons",
          level: "Provincial",
          dates: "12/03-14/03/2024",
          reference: "H-2024-01",
          series: "6",
        },
        {
          id: "",
          name: "Tournoi sans lien",
          level: "Régional",
          dates: "20/04/2024",
          reference: "",
          series: "",
        },
      ],
      3
    );

    it("should read one competition per row with a tournament link", () => {
      const { records, issues } = extract(page, "competition-list");

      expect(records).toEqual([
        {
          kind: "competition",
          id: "101",
          name: present("Tournoi de Mons"),
          level: present("Provincial"),
          dateStart: present("2024-03-12"),
          dateEnd: present("2024-03-14"),
          reference: present("H-2024-01"),
          seriesCount: present(6),
        },
      ]);
      expect(issues).toEqual([
        'tournament "Tournoi sans lien" dropped: no tournament id',
      ]);
    });

    it("should count pages from the pagination links", () => {
      expect(extractPageCount(page)).toBe(3);
    });

    it("should count a single page without pagination", () => {
      expect(extractPageCount("<html><body></body></html>")).toBe(1);
    });

    it("should fail without the tournament table", () => {
      expect(() =>
        extract("<html><body><table><tr><th>X</th></tr></table></body></html>", "competition-list")
      ).toThrow(ExtractionError);
    });
  });

  describe("series", () => {
    it("should read series with their entry counts", () => {
      const { records, issues } = extract(
        seriesPage([
          { date: "12/03/2024", time: "09:00", name: "Série E", entries: "24 / 32" },
          { date: "", time: "", name: "Série NC", entries: "complet" },
          { date: "12/03/2024", time: "13:00", name: "", entries: "0/16" },
        ]),
        "competition-series",
        { competitionId: "101" }
      );

      expect(records).toEqual([
        {
          kind: "competition-series",
          competitionId: "101",
          seriesName: "Série E",
          seriesDate: present("2024-03-12"),
          startTime: present("09:00"),
          entriesCount: present(24),
          entriesMax: present(32),
        },
        {
          kind: "competition-series",
          competitionId: "101",
          seriesName: "Série NC",
          seriesDate: absent,
          startTime: absent,
          entriesCount: absent,
          entriesMax: absent,
        },
      ]);
      expect(issues).toEqual(["series on 12/03/2024 of 101 dropped: no name"]);
    });

    it("should require the competition id", () => {
      expect(() => extract(seriesPage([]), "competition-series")).toThrow(
        "competition-series extraction needs competitionId"
      );
    });
  });

  describe("registrations", () => {
    it("should read one registration per row", () => {
      const { records, issues } = extract(
        registrationsPage([
          {
            series: "Série E",
            licence: "111111",
            name: "DUPONT Jean",
            club: "TT Example",
            rank: "E2",
          },
          {
            series: "Série E",
            licence: "",
            name: "INCONNU",
            club: "",
            rank: "",
          },
        ]),
        "competition-registrations",
        { competitionId: "101" }
      );

      expect(records).toEqual([
        {
          kind: "registration",
          competitionId: "101",
          seriesName: "Série E",
          licence: "111111",
          playerName: present("DUPONT Jean"),
          organizationName: present("TT Example"),
          rank: present("E2"),
        },
      ]);
      expect(issues).toEqual([
        'registration "INCONNU" of 101 dropped: missing series or licence',
      ]);
    });

    it("should fail when the page has no registration table", () => {
      expect(() =>
        extract("<html><body></body></html>", "competition-registrations", {
          competitionId: "101",
        })
      ).toThrow("No registration table found for tournament 101");
    });
  });
});
