import { describe, it, expect } from "vitest";

import {
  compareRanks,
  isRankToken,
  rankScore,
} from "../../../src/scraper/ranks.js";

describe("scraper/ranks", () => {
  it("should recognise rank tokens", () => {
    expect(isRankToken("NC")).toBe(true);
    expect(isRankToken("e6")).toBe(true);
    expect(isRankToken("A12")).toBe(true);
    expect(isRankToken("F1")).toBe(false);
    expect(isRankToken("1100 pts")).toBe(false);
  });

  it("should score higher tiers above lower ones", () => {
    expect(rankScore("NC")).toBe(0);
    expect(rankScore("E6")).toBe(193);
    expect(rankScore("E0")).toBe(199);
    expect(rankScore("D6")).toBe(293);
    expect(rankScore("zz")).toBeNull();
  });

  it("should sort strongest first with unknown tokens last", () => {
    const sorted = ["E6", "NC", "?", "C2", "E0", "A1", "D4"].sort(compareRanks);

    expect(sorted).toEqual(["A1", "C2", "D4", "E0", "E6", "NC", "?"]);
  });
});
