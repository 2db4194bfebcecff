/**
 * Player sheet: identity, points, opponent-rank stats and match cards.
 *
 * The men's and women's sheets share one layout; the bracket decides which
 * player columns the values land in.
 */

import { readTables } from "./html.js";
import { playerRecord } from "./records.js";
import {
  normalizeSpaces,
  parseDateRange,
  parseDecimal,
  parseIdentityLine,
  parseInteger,
} from "./text.js";
import { ExtractionError } from "./types.js";
import {
  absent,
  fieldOf,
  present,
  textField,
  type Bracket,
  type ExtractedRecord,
  type MatchRecord,
  type OpponentStatRecord,
  type PlayerRecord,
} from "../../types/index.js";
import { isRankToken } from "../ranks.js";

import type { Extraction, ExtractionContext } from "./types.js";
import type * as cheerio from "cheerio";

interface SheetSummary {
  pointsStart: number | null;
  pointsCurrent: number | null;
  rankingPosition: number | null;
}

// Each "N pts" h3 is labelled by the h5 before it
function readSummary($: cheerio.CheerioAPI): SheetSummary {
  const summary: SheetSummary = {
    pointsStart: null,
    pointsCurrent: null,
    rankingPosition: null,
  };
  let label = "";

  $("h5, h3").each((_, heading) => {
    const $heading = $(heading);
    const text = normalizeSpaces($heading.text());
    if ($heading.is("h5")) {
      label = text.toLowerCase();
      return;
    }

    if (/pts/i.test(text)) {
      const points = parseDecimal(text);
      if (points === null) return;
      if (label.includes("part") || label.includes("start")) {
        summary.pointsStart = points;
      } else if (label.includes("actuel") || label.includes("current")) {
        summary.pointsCurrent = points;
      }
    } else if (/\d+\s*(?:e|ème)$/i.test(text)) {
      summary.rankingPosition = parseDecimal(text);
    }
  });

  return summary;
}

function readLastUpdate($: cheerio.CheerioAPI): string | null {
  const text = normalizeSpaces($.root().text());
  const match = /(?:Mise à jour|Update)\D{0,40}(\d{2}\/\d{2}\/\d{2,4})/i.exec(
    text
  );
  if (match === null) {
    return null;
  }
  return parseDateRange(match[1] ?? "")?.start ?? null;
}

function readOpponentStats(
  $: cheerio.CheerioAPI,
  licence: string,
  bracket: Bracket
): OpponentStatRecord[] {
  const table = readTables($).find((candidate) =>
    candidate.rows.some((row) => /victoire|win/i.test(row.cells[0] ?? ""))
  );
  if (table === undefined) {
    return [];
  }

  // First column labels the row; the header row holds the rank buckets
  const headerCells =
    table.headers.length > 0 ? table.headers : (table.rows[0]?.cells ?? []);
  const buckets = headerCells.slice(1);
  const wins = new Map<string, number>();
  const losses = new Map<string, number>();
  const ratios = new Map<string, number>();

  for (const row of table.rows) {
    const [label = "", ...values] = row.cells;
    const target = /victoire|win/i.test(label)
      ? wins
      : /faite|loss/i.test(label)
        ? losses
        : /ratio|%/i.test(label)
          ? ratios
          : null;
    if (target === null) continue;

    values.forEach((value, index) => {
      const bucket = buckets[index];
      const parsed =
        target === ratios ? parseDecimal(value) : parseInteger(value);
      if (bucket !== undefined && parsed !== null) {
        target.set(bucket, parsed);
      }
    });
  }

  return buckets
    .filter((bucket) => bucket !== "")
    .map((bucket) => ({
      kind: "opponent-stat" as const,
      playerLicence: licence,
      bracket,
      bucket,
      wins: wins.get(bucket) ?? 0,
      losses: losses.get(bucket) ?? 0,
      ratio: fieldOf(ratios.get(bucket)),
    }));
}

const DAY_HEADER =
  /^(\d{2}\/\d{2}\/\d{4})\s*-\s*([A-Z0-9/]+)\s*-\s*(.+?)\s*(?:Total|Les points|$)/;

function readMatches(
  $: cheerio.CheerioAPI,
  licence: string,
  bracket: Bracket
): { matches: MatchRecord[]; issues: string[] } {
  const matches: MatchRecord[] = [];
  const issues: string[] = [];

  $("div.card").each((_, card) => {
    const $card = $(card);
    const header = normalizeSpaces($card.find(".card-header").first().text());
    const day = DAY_HEADER.exec(header);
    if (day === null) return;

    const date = parseDateRange(day[1] ?? "")?.start;
    if (date === undefined) return;
    const division = textField(day[2]);
    const opponentClub = textField(day[3]);

    $card.find(".match-card").each((_, matchCard) => {
      const $match = $(matchCard);
      const opponentName = textField($match.find("h6").first().text());
      const opponentLicence = textField(
        $match.find('input[name="licence"]').first().attr("value")
      );

      if (!opponentName.present && !opponentLicence.present) {
        issues.push(`match of ${licence} on ${date} dropped: no opponent`);
        return;
      }

      let opponentRank: MatchRecord["opponentRank"] = absent;
      let opponentPoints: MatchRecord["opponentPoints"] = absent;
      $match.find("small").each((_, small) => {
        const text = normalizeSpaces($(small).text());
        if (isRankToken(text)) {
          opponentRank = present(text.toUpperCase());
        } else if (/pts/i.test(text)) {
          opponentPoints = fieldOf(parseDecimal(text));
        }
      });

      const scoreText = normalizeSpaces(
        $match.find("h5.fw-bold").first().text()
      );
      const score = /(\d+)\s*-\s*(\d+)/.exec(scoreText);
      const badge = normalizeSpaces($match.find(".badge").first().text());

      matches.push({
        kind: "match",
        playerLicence: licence,
        bracket,
        date,
        division,
        opponentClub,
        opponentName,
        opponentLicence,
        opponentRank,
        opponentPoints,
        score:
          score !== null
            ? present(`${score[1] ?? ""}-${score[2] ?? ""}`)
            : absent,
        won:
          score !== null
            ? present(Number(score[1]) > Number(score[2]))
            : absent,
        pointsDelta: /pts/i.test(badge)
          ? fieldOf(parseDecimal(badge))
          : absent,
      });
    });
  });

  return { matches, issues };
}

export function extractProfile(
  $: cheerio.CheerioAPI,
  context: ExtractionContext
): Extraction {
  const bracket = context.bracket ?? "men";
  const identity = parseIdentityLine($("h2").first().text());
  if (identity === null) {
    throw new ExtractionError(
      `No player identity line found${context.licence !== undefined ? ` for ${context.licence}` : ""}`,
      "profile"
    );
  }

  if (context.licence !== undefined && identity.id !== context.licence) {
    throw new ExtractionError(
      `Sheet of ${identity.id} served for ${context.licence}`,
      "profile"
    );
  }
  const licence = identity.id;
  const summary = readSummary($);
  const stats = readOpponentStats($, licence, bracket);
  const { matches, issues } = readMatches($, licence, bracket);

  const totalWins =
    stats.length > 0
      ? present(stats.reduce((sum, stat) => sum + stat.wins, 0))
      : absent;
  const totalLosses =
    stats.length > 0
      ? present(stats.reduce((sum, stat) => sum + stat.losses, 0))
      : absent;

  let player: PlayerRecord;
  if (bracket === "men") {
    player = playerRecord(licence, {
      name: identity.name,
      rank: identity.rank,
      pointsStart: fieldOf(summary.pointsStart),
      pointsCurrent: fieldOf(summary.pointsCurrent),
      rankingPosition: fieldOf(summary.rankingPosition),
      totalWins,
      totalLosses,
      lastUpdate: fieldOf(readLastUpdate($)),
    });
  } else {
    player = playerRecord(licence, {
      womenRank: identity.rank,
      womenPointsStart: fieldOf(summary.pointsStart),
      womenPointsCurrent: fieldOf(summary.pointsCurrent),
      womenTotalWins: totalWins,
      womenTotalLosses: totalLosses,
    });
  }

  const records: ExtractedRecord[] = [player, ...stats, ...matches];
  return { records, issues };
}
