/**
 * Text-level parsing shared by the page extractors
 */

import { absent, present, type Field } from "../../types/index.js";

export const normalizeSpaces = (text: string): string =>
  text.replace(/\s+/g, " ").trim();

// ============================================================================
// Composite identity line: "<id> - <full name> - <rank>"
// ============================================================================

export interface IdentityLine {
  id: string;
  name: Field<string>;
  rank: Field<string>;
}

/**
 * Split a composite identity line.
 *
 * Only a hyphen with whitespace on both sides separates fields, so
 * "JEAN-FRANCOIS" stays one name. The name runs from the first to the last
 * separator; a trailing bare hyphen means the rank is missing.
 */
export function parseIdentityLine(line: string): IdentityLine | null {
  const text = normalizeSpaces(line).replace(/\s*Voir fiche.*$/i, "");
  const head = /^(\d+)\s+-(?:\s+(.*))?$/.exec(text);
  if (head === null) {
    return null;
  }

  const id = head[1] ?? "";
  const rest = (head[2] ?? "").trim();

  // "<id> - - <rank>": the name segment is empty
  const rankOnly = /^-\s+([^\s-]\S*)$/.exec(rest);
  if (rankOnly !== null) {
    return { id, name: absent, rank: present(rankOnly[1] ?? "") };
  }

  const withRank = /^(.*\S)\s+-\s+(\S+)$/.exec(rest);
  if (withRank !== null) {
    return {
      id,
      name: present(withRank[1] ?? ""),
      rank: present(withRank[2] ?? ""),
    };
  }

  const withoutRank = /^(?:(.*\S)\s+)?-$/.exec(rest);
  const name = withoutRank !== null ? (withoutRank[1] ?? "") : rest;
  return {
    id,
    name: name === "" ? absent : present(name),
    rank: absent,
  };
}

/**
 * "CODE - NAME" option labels of the club selector
 */
export function parseCodeAndName(
  label: string
): { code: string; name: string } | null {
  const text = normalizeSpaces(label);
  if (text === "" || text.startsWith("--")) {
    return null;
  }
  const match = /^([A-Za-z0-9_-]+)\s+-\s+(.+)$/.exec(text);
  if (match === null) {
    return null;
  }
  return { code: match[1] ?? "", name: (match[2] ?? "").trim() };
}

// ============================================================================
// Dates
// ============================================================================

export interface DateRange {
  start: string;
  end: string;
}

function toIsoDate(day: string, month: string, year: string): string | null {
  const fullYear = year.length === 2 ? `20${year}` : year;
  const d = Number(day);
  const m = Number(month);
  const y = Number(fullYear);
  const date = new Date(Date.UTC(y, m - 1, d));
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== m - 1 ||
    date.getUTCDate() !== d
  ) {
    return null;
  }
  return `${fullYear}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/**
 * Parse "DD/MM/YYYY", "DD/MM-DD/MM/YYYY" or "DD/MM/YYYY-DD/MM/YYYY".
 * A single date yields start == end.
 */
export function parseDateRange(text: string): DateRange | null {
  const value = normalizeSpaces(text);

  const full =
    /(\d{1,2})\/(\d{1,2})\/(\d{4})\s*-\s*(\d{1,2})\/(\d{1,2})\/(\d{4})/.exec(
      value
    );
  if (full !== null) {
    const [, d1 = "", m1 = "", y1 = "", d2 = "", m2 = "", y2 = ""] = full;
    const start = toIsoDate(d1, m1, y1);
    const end = toIsoDate(d2, m2, y2);
    return start !== null && end !== null ? { start, end } : null;
  }

  const sharedYear = /(\d{1,2})\/(\d{1,2})\s*-\s*(\d{1,2})\/(\d{1,2})\/(\d{4})/.exec(
    value
  );
  if (sharedYear !== null) {
    const [, d1 = "", m1 = "", d2 = "", m2 = "", year = ""] = sharedYear;
    const start = toIsoDate(d1, m1, year);
    const end = toIsoDate(d2, m2, year);
    return start !== null && end !== null ? { start, end } : null;
  }

  const single = /(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})(?!\d)/.exec(value);
  if (single !== null) {
    const [, day = "", month = "", year = ""] = single;
    const date = toIsoDate(day, month, year);
    return date !== null ? { start: date, end: date } : null;
  }

  return null;
}

// ============================================================================
// Numbers
// ============================================================================

/**
 * First decimal number in the text; accepts a comma as decimal separator
 */
export function parseDecimal(text: string): number | null {
  const match = /[-+]?\d+(?:[.,]\d+)?/.exec(text.replaceAll(" ", ""));
  if (match === null) {
    return null;
  }
  const value = Number(match[0].replace(",", "."));
  return Number.isFinite(value) ? value : null;
}

export function parseInteger(text: string): number | null {
  const match = /^\s*(\d+)\s*$/.exec(text);
  return match !== null ? Number(match[1]) : null;
}

/** "oui"/"non" style flags */
export function parseYesNo(text: string): boolean | null {
  const value = text.trim().toLowerCase();
  if (["oui", "yes", "true", "1"].includes(value)) return true;
  if (["non", "no", "false", "0"].includes(value)) return false;
  return null;
}
