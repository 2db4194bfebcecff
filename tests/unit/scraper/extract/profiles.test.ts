import { describe, it, expect } from "vitest";

import {
  extract,
  ExtractionError,
} from "../../../../src/scraper/extract/index.js";
import { absent, present } from "../../../../src/types/index.js";
import { profilePage, type SheetDay } from "../../../fixtures/pages.js";

const day: SheetDay = {
  date: "10/02/2024",
  division: "P1",
  club: "TT Other",
  matches: [
    {
      name: "MARTIN Paul",
      licence: "654321",
      rank: "C4",
      points: "1100 pts",
      score: "3 - 1",
      delta: "+4,5 pts",
    },
    {
      name: "LEROY Anne-Sophie",
      licence: "",
      rank: "NC",
      points: "900 pts",
      score: "1 - 3",
      delta: "-2 pts",
    },
  ],
};

const sheet = profilePage({
  identity: "123456 - DUPONT Jean-Marc - C2",
  pointsStart: "1200 pts",
  pointsCurrent: "1234,5 pts",
  position: "12e",
  update: "15/02/2024",
  buckets: [
    { rank: "C0", wins: 3, losses: 1, ratio: "75%" },
    { rank: "C2", wins: 2, losses: 2, ratio: "50%" },
  ],
  days: [day],
});

describe("scraper/extract/profiles", () => {
  it("should read the men's sheet into the player columns", () => {
    const { records, issues } = extract(sheet, "profile", {
      licence: "123456",
    });

    expect(issues).toEqual([]);
    expect(records.map((record) => record.kind)).toEqual([
      "player",
      "opponent-stat",
      "opponent-stat",
      "match",
      "match",
    ]);
    expect(records[0]).toEqual({
      kind: "player",
      licence: "123456",
      name: present("DUPONT Jean-Marc"),
      rank: present("C2"),
      organizationCode: absent,
      category: absent,
      pointsStart: present(1200),
      pointsCurrent: present(1234.5),
      rankingPosition: present(12),
      totalWins: present(5),
      totalLosses: present(3),
      womenRank: absent,
      womenPointsStart: absent,
      womenPointsCurrent: absent,
      womenTotalWins: absent,
      womenTotalLosses: absent,
      lastUpdate: present("2024-02-15"),
    });
  });

  it("should read one opponent stat per rank bucket", () => {
    const { records } = extract(sheet, "profile");

    expect(records.slice(1, 3)).toEqual([
      {
        kind: "opponent-stat",
        playerLicence: "123456",
        bracket: "men",
        bucket: "C0",
        wins: 3,
        losses: 1,
        ratio: present(75),
      },
      {
        kind: "opponent-stat",
        playerLicence: "123456",
        bracket: "men",
        bucket: "C2",
        wins: 2,
        losses: 2,
        ratio: present(50),
      },
    ]);
  });

  it("should read match cards with their day header", () => {
    const { records } = extract(sheet, "profile");

    expect(records[3]).toEqual({
      kind: "match",
      playerLicence: "123456",
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
    });
    expect(records[4]).toMatchObject({
      opponentName: present("LEROY Anne-Sophie"),
      opponentLicence: absent,
      opponentRank: present("NC"),
      score: present("1-3"),
      won: present(false),
      pointsDelta: present(-2),
    });
  });

  it("should put the women's sheet into the women columns", () => {
    const { records } = extract(sheet, "profile", { bracket: "women" });

    expect(records[0]).toMatchObject({
      kind: "player",
      licence: "123456",
      name: absent,
      rank: absent,
      pointsStart: absent,
      womenRank: present("C2"),
      womenPointsStart: present(1200),
      womenPointsCurrent: present(1234.5),
      womenTotalWins: present(5),
      womenTotalLosses: present(3),
    });
    expect(records[1]).toMatchObject({ bracket: "women" });
    expect(records[3]).toMatchObject({ bracket: "women" });
  });

  it("should leave totals absent without a stats table", () => {
    const { records } = extract(
      profilePage({ identity: "42 - NOUVEAU Joueur -" }),
      "profile"
    );

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      licence: "42",
      name: present("NOUVEAU Joueur"),
      rank: absent,
      totalWins: absent,
      totalLosses: absent,
      lastUpdate: absent,
    });
  });

  it("should drop matches without an opponent", () => {
    const page = profilePage({
      identity: "123456 - DUPONT Jean - C2",
      days: [
        {
          ...day,
          matches: [
            {
              name: "",
              licence: "",
              rank: "NC",
              points: "",
              score: "3 - 0",
              delta: "",
            },
          ],
        },
      ],
    });

    const { records, issues } = extract(page, "profile");

    expect(records).toHaveLength(1);
    expect(issues).toEqual([
      "match of 123456 on 2024-02-10 dropped: no opponent",
    ]);
  });

  it("should refuse a sheet served for another licence", () => {
    const run = () => extract(sheet, "profile", { licence: "654321" });

    expect(run).toThrow(ExtractionError);
    expect(run).toThrow("Sheet of 123456 served for 654321");
  });

  it("should fail without an identity line", () => {
    const run = () =>
      extract("<html><body><h1>Erreur</h1></body></html>", "profile", {
        licence: "999",
      });

    expect(run).toThrow(ExtractionError);
    expect(run).toThrow("No player identity line found for 999");
  });
});
