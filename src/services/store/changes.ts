/**
 * Building blocks of the non-regression merge: change sets made only of the
 * attributes a record actually carries, natural-key checks and match keys.
 */

import { createHash } from "node:crypto";

import { sql, type RawBuilder } from "kysely";

import type { Field, MatchRecord } from "../../types/index.js";

// ============================================================================
// Change sets
// ============================================================================

/**
 * Column values to write, holding present fields only
 */
export class ChangeSet<Row extends object> {
  readonly values: Partial<Row> = {};
  private count = 0;

  set<K extends keyof Row>(column: K, field: Field<NonNullable<Row[K]>>): this {
    if (field.present) {
      this.values[column] = field.value;
      this.count++;
    }
    return this;
  }

  get size(): number {
    return this.count;
  }
}

export function mapField<T, U>(field: Field<T>, map: (value: T) => U): Field<U> {
  return field.present ? { present: true, value: map(field.value) } : field;
}

export const toFlag = (value: boolean): number => (value ? 1 : 0);

export function nullable<T>(field: Field<T>): T | null {
  return field.present ? field.value : null;
}

/**
 * ON CONFLICT guard, true when one of the columns would take a new value or
 * one of the extra conditions holds. Keeps `updated_at` still on a re-merge
 * of identical data.
 */
export function changesStored(
  table: string,
  columns: string[],
  extra: RawBuilder<unknown>[] = []
): RawBuilder<boolean> {
  const checks = [
    ...columns.map(
      (column) =>
        sql`${sql.ref(`${table}.${column}`)} is distinct from ${sql.ref(`excluded.${column}`)}`
    ),
    ...extra,
  ];
  if (checks.length === 0) {
    return sql<boolean>`false`;
  }
  return sql<boolean>`(${sql.join(checks, sql` or `)})`;
}

// ============================================================================
// Natural keys
// ============================================================================

const ORGANIZATION_CODE = /^[A-Za-z0-9_-]{1,20}$/;
const LICENCE = /^(?=.*\d)[A-Za-z0-9]{1,20}$/;
const COMPETITION_ID = /^\d{1,12}$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function checkOrganizationCode(code: string): string | null {
  return ORGANIZATION_CODE.test(code)
    ? null
    : `invalid organization code "${code}"`;
}

export function checkLicence(licence: string): string | null {
  return LICENCE.test(licence) ? null : `invalid licence "${licence}"`;
}

export function checkCompetitionId(id: string): string | null {
  return COMPETITION_ID.test(id) ? null : `invalid competition id "${id}"`;
}

export function checkSeriesName(name: string): string | null {
  return name.trim() !== "" ? null : "empty series name";
}

export function checkMatch(record: MatchRecord): string | null {
  if (!ISO_DATE.test(record.date)) {
    return `invalid match date "${record.date}"`;
  }
  if (!record.opponentLicence.present && !record.opponentName.present) {
    return "match without opponent";
  }
  return checkLicence(record.playerLicence);
}

// ============================================================================
// Match identity
// ============================================================================

/**
 * Hash of (player, bracket, date, division, opponent). The opponent is keyed
 * by licence, or by name when the sheet gives no licence.
 */
export function computeMatchKey(record: MatchRecord): string {
  const opponent = record.opponentLicence.present
    ? `L:${record.opponentLicence.value}`
    : `N:${nullable(record.opponentName) ?? ""}`;

  const key = [
    record.playerLicence,
    record.bracket,
    record.date,
    nullable(record.division) ?? "",
    opponent,
  ].join("|");

  return createHash("sha256").update(key).digest("hex");
}
