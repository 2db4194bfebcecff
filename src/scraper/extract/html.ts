import * as cheerio from "cheerio";

import { normalizeSpaces } from "./text.js";

export interface TableRow {
  cells: string[];
  links: string[];
}

export interface HtmlTable {
  headers: string[];
  rows: TableRow[];
}

/**
 * Every table of the page as plain text. `rows` holds the rows with at least
 * one `td`; header-only rows land in `headers`.
 */
export function readTables($: cheerio.CheerioAPI): HtmlTable[] {
  return $("table")
    .toArray()
    .map((table) => {
      const $table = $(table);
      const headers = $table
        .find("th")
        .toArray()
        .map((th) => normalizeSpaces($(th).text()));

      const rows: TableRow[] = [];
      $table.find("tr").each((_, tr) => {
        const $tr = $(tr);
        const cells = $tr
          .find("td")
          .toArray()
          .map((td) => normalizeSpaces($(td).text()));
        if (cells.length === 0) {
          return;
        }
        const links = $tr
          .find("a[href]")
          .toArray()
          .map((a) => $(a).attr("href") ?? "")
          .filter((href) => href !== "");
        rows.push({ cells, links });
      });

      return { headers, rows };
    });
}

/**
 * Text lines of an HTML fragment, one per block element or `<br>`
 */
export function blockLines(html: string): string[] {
  const withBreaks = html
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(?:p|div|li|tr|dd|dt|h[1-6])>/gi, "$&\n");
  return cheerio
    .load(withBreaks)
    .root()
    .text()
    .split("\n")
    .map(normalizeSpaces)
    .filter((line) => line !== "");
}

/**
 * "Key: value" lines, keys lower-cased
 */
export function keyValueLines(
  lines: string[]
): Array<{ key: string; value: string }> {
  const pairs: Array<{ key: string; value: string }> = [];
  for (const line of lines) {
    const separator = line.indexOf(":");
    if (separator <= 0) continue;
    pairs.push({
      key: line.slice(0, separator).trim().toLowerCase(),
      value: line.slice(separator + 1).trim(),
    });
  }
  return pairs;
}

export interface CardSection {
  header: string;
  bodyHtml: string;
  /** First `h4` of the body */
  title: string;
  /** First absolute link of the body */
  link: string | null;
}

/**
 * Bootstrap cards that have both a header and a body
 */
export function readCards($: cheerio.CheerioAPI): CardSection[] {
  const sections: CardSection[] = [];
  $("div.card").each((_, card) => {
    const $card = $(card);
    const header = $card.find(".card-header").first();
    const body = $card.find(".card-body").first();
    if (header.length === 0 || body.length === 0) {
      return;
    }

    const link =
      body
        .find("a[href]")
        .toArray()
        .map((a) => $(a).attr("href") ?? "")
        .find((href) => href.startsWith("http")) ?? null;

    sections.push({
      header: normalizeSpaces(header.text()),
      bodyHtml: body.html() ?? "",
      title: normalizeSpaces(body.find("h4").first().text()),
      link,
    });
  });
  return sections;
}
