/**
 * Tournament calendar: list pages, series and registrations
 */

import { readTables, type HtmlTable } from "./html.js";
import { competitionRecord } from "./records.js";
import { parseDateRange, parseInteger } from "./text.js";
import { ExtractionError, requireContext } from "./types.js";
import { absent, fieldOf, present, textField } from "../../types/index.js";

import type { Extraction, ExtractionContext } from "./types.js";
import type {
  CompetitionSeriesRecord,
  ExtractedRecord,
  RegistrationRecord,
} from "../../types/index.js";
import type * as cheerio from "cheerio";

function findTable(
  $: cheerio.CheerioAPI,
  matches: (headers: string[]) => boolean
): HtmlTable | undefined {
  return readTables($).find((table) => matches(table.headers));
}

function competitionIdFrom(links: string[]): string | null {
  for (const href of links) {
    const match = /t_id=(\d+)/.exec(href);
    if (match !== null) {
      return match[1] ?? null;
    }
  }
  return null;
}

/**
 * Highest `cur_page` referenced by the pagination links, 1 when there are none
 */
export function countPages($: cheerio.CheerioAPI): number {
  let pages = 1;
  $('a[href*="cur_page="]').each((_, link) => {
    const match = /cur_page=(\d+)/.exec($(link).attr("href") ?? "");
    if (match !== null) {
      pages = Math.max(pages, Number(match[1]));
    }
  });
  return pages;
}

export function extractCompetitionList($: cheerio.CheerioAPI): Extraction {
  const table = findTable(
    $,
    (headers) => headers.includes("Nom") && headers.includes("Niveau")
  );
  if (table === undefined) {
    throw new ExtractionError(
      "No tournament table found on the page",
      "competition-list"
    );
  }

  const records: ExtractedRecord[] = [];
  const issues: string[] = [];

  for (const row of table.rows) {
    // Pagination rows have fewer cells
    if (row.cells.length < 5) continue;

    const [name = "", level = "", dates = "", reference = "", series = ""] =
      row.cells;
    const id = competitionIdFrom(row.links);
    if (id === null) {
      issues.push(`tournament "${name}" dropped: no tournament id`);
      continue;
    }

    const range = parseDateRange(dates);
    records.push(
      competitionRecord(id, {
        name: textField(name),
        level: textField(level),
        dateStart: range !== null ? present(range.start) : absent,
        dateEnd: range !== null ? present(range.end) : absent,
        reference: textField(reference),
        seriesCount: fieldOf(parseInteger(series)),
      })
    );
  }

  return { records, issues };
}

export function extractCompetitionSeries(
  $: cheerio.CheerioAPI,
  context: ExtractionContext
): Extraction {
  const competitionId = requireContext(
    context.competitionId,
    "competitionId",
    "competition-series"
  );
  const table = findTable(
    $,
    (headers) =>
      headers.includes("Série") ||
      (headers.includes("Date") && headers.includes("Heure"))
  );
  if (table === undefined) {
    throw new ExtractionError(
      `No series table found for tournament ${competitionId}`,
      "competition-series"
    );
  }

  const records: CompetitionSeriesRecord[] = [];
  const issues: string[] = [];

  for (const row of table.rows) {
    if (row.cells.length < 4) continue;

    const [date = "", time = "", seriesName = "", entries = ""] = row.cells;
    if (seriesName === "") {
      issues.push(`series on ${date} of ${competitionId} dropped: no name`);
      continue;
    }

    const counts = /(\d+)\s*\/\s*(\d+)/.exec(entries);
    records.push({
      kind: "competition-series",
      competitionId,
      seriesName,
      seriesDate: fieldOf(parseDateRange(date)?.start),
      startTime: textField(time),
      entriesCount: counts !== null ? present(Number(counts[1])) : absent,
      entriesMax: counts !== null ? present(Number(counts[2])) : absent,
    });
  }

  return { records, issues };
}

export function extractCompetitionRegistrations(
  $: cheerio.CheerioAPI,
  context: ExtractionContext
): Extraction {
  const competitionId = requireContext(
    context.competitionId,
    "competitionId",
    "competition-registrations"
  );
  const table = findTable(
    $,
    (headers) => headers.includes("Index") && headers.includes("Nom")
  );
  if (table === undefined) {
    throw new ExtractionError(
      `No registration table found for tournament ${competitionId}`,
      "competition-registrations"
    );
  }

  const records: RegistrationRecord[] = [];
  const issues: string[] = [];

  for (const row of table.rows) {
    if (row.cells.length < 3) continue;

    const [seriesName = "", licence = "", name = "", club = "", rank = ""] =
      row.cells;
    if (seriesName === "" || !/\d/.test(licence)) {
      issues.push(
        `registration "${name}" of ${competitionId} dropped: missing series or licence`
      );
      continue;
    }

    records.push({
      kind: "registration",
      competitionId,
      seriesName,
      licence,
      playerName: textField(name),
      organizationName: textField(club),
      rank: textField(rank),
    });
  }

  return { records, issues };
}
