/**
 * ReconciliationStore - merges extracted records into durable state
 *
 * A merge never regresses what is stored: attributes missing from the
 * incoming record keep their stored value, attributes it carries overwrite.
 * Every merge is a single INSERT ... ON CONFLICT statement. Matches and
 * opponent statistics are the exception and are replaced in full.
 */

import { sql, type Kysely, type Updateable } from "kysely";

import {
  ChangeSet,
  changesStored,
  checkCompetitionId,
  checkLicence,
  checkMatch,
  checkOrganizationCode,
  checkSeriesName,
  computeMatchKey,
  mapField,
  nullable,
  toFlag,
} from "./changes.js";
import { dbLogger } from "../../logger.js";
import { compareRanks } from "../../scraper/ranks.js";
import { deriveRegion } from "../../scraper/regions.js";
import { errorMessage } from "../../utils/errors.js";

import type {
  Competition,
  CompetitionSeries,
  CompetitionSeriesTable,
  CompetitionsTable,
  Database,
  Match,
  OpponentStat,
  Organization,
  OrganizationsTable,
  Player,
  PlayersTable,
  Registration,
  RegistrationsTable,
} from "../../db/types.js";
import type {
  Bracket,
  CompetitionRecord,
  CompetitionSeriesRecord,
  ExtractedRecord,
  MatchRecord,
  OpponentStatRecord,
  OrganizationRecord,
  PlayerRecord,
  RecordKind,
  RegistrationRecord,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type MergeResult =
  | { status: "applied"; kind: RecordKind }
  | { status: "rejected"; kind: RecordKind; reason: string };

/**
 * The store could not be reached or refused a write
 */
export class StoreUnavailableError extends Error {
  code = "STORE_UNAVAILABLE" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export interface OrganizationFilter {
  region?: string;
  search?: string;
  limit?: number;
  offset?: number;
}

export interface PlayerFilter {
  clubCode?: string;
  rank?: string;
  minPoints?: number;
  maxPoints?: number;
  search?: string;
  limit?: number;
  offset?: number;
}

export interface CatalogCounts {
  clubs: number;
  players: number;
  /** Players with current points or a rank */
  activePlayers: number;
  matches: number;
  competitions: number;
  /** Finish time of the latest successful task, if any */
  lastScrapeAt: string | null;
}

export interface MatchFilter {
  bracket?: Bracket;
  opponentLicence?: string;
  limit?: number;
}

export interface HeadToHead {
  playerLicence: string;
  opponentLicence: string;
  played: number;
  wins: number;
  losses: number;
  matches: Match[];
}

// ============================================================================
// Store
// ============================================================================

export class ReconciliationStore {
  constructor(
    private db: Kysely<Database>,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Merge one record. Resolves to `rejected` for a malformed natural key,
   * throws StoreUnavailableError when the write itself fails.
   */
  async merge(record: ExtractedRecord): Promise<MergeResult> {
    const reason = this.validate(record);
    if (reason !== null) {
      return { status: "rejected", kind: record.kind, reason };
    }

    try {
      await this.apply(record);
    } catch (error) {
      dbLogger.error(
        { kind: record.kind, error: errorMessage(error) },
        "Merge failed"
      );
      throw new StoreUnavailableError(
        `Store write failed for ${record.kind}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return { status: "applied", kind: record.kind };
  }

  private validate(record: ExtractedRecord): string | null {
    switch (record.kind) {
      case "organization":
        return checkOrganizationCode(record.code);
      case "player":
        return checkLicence(record.licence);
      case "match":
        return checkMatch(record);
      case "opponent-stat":
        return (
          checkLicence(record.playerLicence) ??
          (record.bucket.trim() === "" ? "empty rank bucket" : null)
        );
      case "competition":
        return checkCompetitionId(record.id);
      case "competition-series":
        return (
          checkCompetitionId(record.competitionId) ??
          checkSeriesName(record.seriesName)
        );
      case "registration":
        return (
          checkCompetitionId(record.competitionId) ??
          checkSeriesName(record.seriesName) ??
          checkLicence(record.licence)
        );
    }
  }

  private async apply(record: ExtractedRecord): Promise<void> {
    switch (record.kind) {
      case "organization":
        return this.mergeOrganization(record);
      case "player":
        return this.mergePlayer(record);
      case "match":
        return this.upsertMatch(record);
      case "opponent-stat":
        return this.replaceOpponentStat(record);
      case "competition":
        return this.mergeCompetition(record);
      case "competition-series":
        return this.mergeCompetitionSeries(record);
      case "registration":
        return this.mergeRegistration(record);
    }
  }

  private now(): string {
    return this.clock().toISOString();
  }

  // ==========================================================================
  // Non-regressive merges
  // ==========================================================================

  private async mergeOrganization(record: OrganizationRecord): Promise<void> {
    const changes = new ChangeSet<Updateable<OrganizationsTable>>()
      .set("name", record.name)
      .set("region", record.region)
      .set("full_name", record.fullName)
      .set("email", record.email)
      .set("phone", record.phone)
      .set("legal_status", record.legalStatus)
      .set("website", record.website)
      .set("has_shower", mapField(record.hasShower, toFlag))
      .set("venue_name", record.venueName)
      .set("venue_address", record.venueAddress)
      .set("venue_phone", record.venuePhone)
      .set("venue_accessible", mapField(record.venueAccessible, toFlag))
      .set("venue_remarks", record.venueRemarks)
      .set("teams_men", record.teamsMen)
      .set("teams_women", record.teamsWomen)
      .set("teams_youth", record.teamsYouth)
      .set("teams_veterans", record.teamsVeterans)
      .set("label", record.label)
      .set("palette", record.palette);

    // A region derived from the code only fills a stored gap
    const derivedRegion = record.region.present
      ? null
      : deriveRegion(record.code);
    const updatedAt = this.now();

    await this.db
      .insertInto("organizations")
      .values({
        ...changes.values,
        ...(derivedRegion !== null ? { region: derivedRegion } : {}),
        code: record.code,
        updated_at: updatedAt,
      })
      .onConflict((oc) => {
        const target = oc.column("code");
        if (changes.size === 0 && derivedRegion === null) {
          return target.doNothing();
        }
        return target
          .doUpdateSet({
            ...changes.values,
            ...(derivedRegion !== null
              ? {
                  region: sql<string>`coalesce(${sql.ref("organizations.region")}, ${derivedRegion})`,
                }
              : {}),
            updated_at: updatedAt,
          })
          .where(
            changesStored(
              "organizations",
              Object.keys(changes.values),
              derivedRegion !== null
                ? [sql`${sql.ref("organizations.region")} is null`]
                : []
            )
          );
      })
      .execute();
  }

  private async mergePlayer(record: PlayerRecord): Promise<void> {
    const changes = new ChangeSet<Updateable<PlayersTable>>()
      .set("name", record.name)
      .set("rank", record.rank)
      .set("organization_code", record.organizationCode)
      .set("category", record.category)
      .set("points_start", record.pointsStart)
      .set("points_current", record.pointsCurrent)
      .set("ranking_position", record.rankingPosition)
      .set("total_wins", record.totalWins)
      .set("total_losses", record.totalLosses)
      .set("women_rank", record.womenRank)
      .set("women_points_start", record.womenPointsStart)
      .set("women_points_current", record.womenPointsCurrent)
      .set("women_total_wins", record.womenTotalWins)
      .set("women_total_losses", record.womenTotalLosses)
      .set("last_update", record.lastUpdate);
    const updatedAt = this.now();

    await this.db
      .insertInto("players")
      .values({
        ...changes.values,
        licence: record.licence,
        updated_at: updatedAt,
      })
      .onConflict((oc) => {
        const target = oc.column("licence");
        return changes.size === 0
          ? target.doNothing()
          : target
              .doUpdateSet({ ...changes.values, updated_at: updatedAt })
              .where(changesStored("players", Object.keys(changes.values)));
      })
      .execute();
  }

  private async mergeCompetition(record: CompetitionRecord): Promise<void> {
    const changes = new ChangeSet<Updateable<CompetitionsTable>>()
      .set("name", record.name)
      .set("level", record.level)
      .set("date_start", record.dateStart)
      .set("date_end", record.dateEnd)
      .set("reference", record.reference)
      .set("series_count", record.seriesCount);
    const updatedAt = this.now();

    await this.db
      .insertInto("competitions")
      .values({ ...changes.values, id: record.id, updated_at: updatedAt })
      .onConflict((oc) => {
        const target = oc.column("id");
        return changes.size === 0
          ? target.doNothing()
          : target
              .doUpdateSet({ ...changes.values, updated_at: updatedAt })
              .where(changesStored("competitions", Object.keys(changes.values)));
      })
      .execute();
  }

  private async mergeCompetitionSeries(
    record: CompetitionSeriesRecord
  ): Promise<void> {
    const changes = new ChangeSet<Updateable<CompetitionSeriesTable>>()
      .set("series_date", record.seriesDate)
      .set("start_time", record.startTime)
      .set("entries_count", record.entriesCount)
      .set("entries_max", record.entriesMax);
    const updatedAt = this.now();

    await this.db
      .insertInto("competition_series")
      .values({
        ...changes.values,
        competition_id: record.competitionId,
        series_name: record.seriesName,
        updated_at: updatedAt,
      })
      .onConflict((oc) => {
        const target = oc.columns(["competition_id", "series_name"]);
        return changes.size === 0
          ? target.doNothing()
          : target
              .doUpdateSet({ ...changes.values, updated_at: updatedAt })
              .where(changesStored("competition_series", Object.keys(changes.values)));
      })
      .execute();
  }

  private async mergeRegistration(record: RegistrationRecord): Promise<void> {
    const changes = new ChangeSet<Updateable<RegistrationsTable>>()
      .set("player_name", record.playerName)
      .set("organization_name", record.organizationName)
      .set("rank", record.rank);
    const updatedAt = this.now();

    await this.db
      .insertInto("registrations")
      .values({
        ...changes.values,
        competition_id: record.competitionId,
        series_name: record.seriesName,
        licence: record.licence,
        updated_at: updatedAt,
      })
      .onConflict((oc) => {
        const target = oc.columns(["competition_id", "series_name", "licence"]);
        return changes.size === 0
          ? target.doNothing()
          : target
              .doUpdateSet({ ...changes.values, updated_at: updatedAt })
              .where(changesStored("registrations", Object.keys(changes.values)));
      })
      .execute();
  }

  // ==========================================================================
  // Full replacements
  // ==========================================================================

  private async upsertMatch(record: MatchRecord): Promise<void> {
    const fields = {
      player_licence: record.playerLicence,
      bracket: record.bracket,
      match_date: record.date,
      division: nullable(record.division),
      opponent_club: nullable(record.opponentClub),
      opponent_name: nullable(record.opponentName),
      opponent_licence: nullable(record.opponentLicence),
      opponent_rank: nullable(record.opponentRank),
      opponent_points: nullable(record.opponentPoints),
      score: nullable(record.score),
      won: nullable(mapField(record.won, toFlag)),
      points_delta: nullable(record.pointsDelta),
    };
    const row = { ...fields, updated_at: this.now() };

    await this.db
      .insertInto("matches")
      .values({ ...row, match_key: computeMatchKey(record) })
      .onConflict((oc) =>
        oc
          .column("match_key")
          .doUpdateSet(row)
          .where(changesStored("matches", Object.keys(fields)))
      )
      .execute();
  }

  private async replaceOpponentStat(record: OpponentStatRecord): Promise<void> {
    const fields = {
      wins: record.wins,
      losses: record.losses,
      ratio: nullable(record.ratio),
    };
    const values = { ...fields, updated_at: this.now() };

    await this.db
      .insertInto("opponent_stats")
      .values({
        ...values,
        player_licence: record.playerLicence,
        bracket: record.bracket,
        bucket: record.bucket,
      })
      .onConflict((oc) =>
        oc
          .columns(["player_licence", "bracket", "bucket"])
          .doUpdateSet(values)
          .where(changesStored("opponent_stats", Object.keys(fields)))
      )
      .execute();
  }

  // ==========================================================================
  // Read accessors
  // ==========================================================================

  async getOrganization(code: string): Promise<Organization | undefined> {
    return this.db
      .selectFrom("organizations")
      .selectAll()
      .where("code", "=", code)
      .executeTakeFirst();
  }

  async listOrganizations(
    filter: OrganizationFilter = {}
  ): Promise<Organization[]> {
    let query = this.db.selectFrom("organizations").selectAll().orderBy("code");

    if (filter.region !== undefined) {
      query = query.where("region", "=", filter.region);
    }
    if (filter.search !== undefined && filter.search !== "") {
      const pattern = `%${filter.search.toLowerCase()}%`;
      query = query.where((eb) =>
        eb.or([
          eb(eb.fn("lower", ["code"]), "like", pattern),
          eb(eb.fn("lower", ["name"]), "like", pattern),
        ])
      );
    }

    return query
      .limit(filter.limit ?? 100)
      .offset(filter.offset ?? 0)
      .execute();
  }

  async listRegions(): Promise<Array<{ region: string; count: number }>> {
    const rows = await this.db
      .selectFrom("organizations")
      .select(["region", sql<number>`cast(count(*) as integer)`.as("count")])
      .where("region", "is not", null)
      .groupBy("region")
      .orderBy("region")
      .execute();

    return rows.flatMap((row) =>
      row.region !== null ? [{ region: row.region, count: Number(row.count) }] : []
    );
  }

  async listOrganizationCodes(): Promise<string[]> {
    const rows = await this.db
      .selectFrom("organizations")
      .select("code")
      .orderBy("code")
      .execute();
    return rows.map((row) => row.code);
  }

  async getPlayer(licence: string): Promise<Player | undefined> {
    return this.db
      .selectFrom("players")
      .selectAll()
      .where("licence", "=", licence)
      .executeTakeFirst();
  }

  async listPlayersByOrganization(code: string): Promise<Player[]> {
    return this.db
      .selectFrom("players")
      .selectAll()
      .where("organization_code", "=", code)
      .orderBy("name")
      .execute();
  }

  /**
   * Players by current points, highest first, unrated players last
   */
  async listPlayers(filter: PlayerFilter = {}): Promise<Player[]> {
    let query = this.db.selectFrom("players").selectAll();

    if (filter.clubCode !== undefined) {
      query = query.where("organization_code", "=", filter.clubCode);
    }
    if (filter.rank !== undefined) {
      query = query.where("rank", "=", filter.rank);
    }
    if (filter.minPoints !== undefined) {
      query = query.where("points_current", ">=", filter.minPoints);
    }
    if (filter.maxPoints !== undefined) {
      query = query.where("points_current", "<=", filter.maxPoints);
    }
    if (filter.search !== undefined && filter.search !== "") {
      const pattern = `%${filter.search.toLowerCase()}%`;
      query = query.where((eb) =>
        eb.or([
          eb("licence", "like", pattern),
          eb(eb.fn("lower", ["name"]), "like", pattern),
        ])
      );
    }

    return query
      .orderBy(sql`points_current is null`)
      .orderBy("points_current", "desc")
      .orderBy("licence")
      .limit(filter.limit ?? 100)
      .offset(filter.offset ?? 0)
      .execute();
  }

  async listPlayerLicences(): Promise<string[]> {
    const rows = await this.db
      .selectFrom("players")
      .select("licence")
      .orderBy("licence")
      .execute();
    return rows.map((row) => row.licence);
  }

  async listMatches(licence: string, filter: MatchFilter = {}): Promise<Match[]> {
    let query = this.db
      .selectFrom("matches")
      .selectAll()
      .where("player_licence", "=", licence);

    if (filter.bracket !== undefined) {
      query = query.where("bracket", "=", filter.bracket);
    }
    if (filter.opponentLicence !== undefined) {
      query = query.where("opponent_licence", "=", filter.opponentLicence);
    }

    return query
      .orderBy("match_date", "desc")
      .orderBy("match_key")
      .limit(filter.limit ?? 200)
      .execute();
  }

  async getHeadToHead(
    playerLicence: string,
    opponentLicence: string
  ): Promise<HeadToHead> {
    const matches = await this.listMatches(playerLicence, { opponentLicence });
    const wins = matches.filter((match) => match.won === 1).length;
    const losses = matches.filter((match) => match.won === 0).length;
    return {
      playerLicence,
      opponentLicence,
      played: matches.length,
      wins,
      losses,
      matches,
    };
  }

  /**
   * Opponent statistics, strongest rank bucket first
   */
  async listOpponentStats(
    licence: string,
    bracket?: Bracket
  ): Promise<OpponentStat[]> {
    let query = this.db
      .selectFrom("opponent_stats")
      .selectAll()
      .where("player_licence", "=", licence);
    if (bracket !== undefined) {
      query = query.where("bracket", "=", bracket);
    }
    const rows = await query.execute();
    return rows.sort(
      (a, b) =>
        a.bracket.localeCompare(b.bracket) || compareRanks(a.bucket, b.bucket)
    );
  }

  async getCompetition(id: string): Promise<Competition | undefined> {
    return this.db
      .selectFrom("competitions")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
  }

  async listCompetitions(
    options: { from?: string; limit?: number; offset?: number } = {}
  ): Promise<Competition[]> {
    let query = this.db.selectFrom("competitions").selectAll();
    if (options.from !== undefined) {
      query = query.where("date_start", ">=", options.from);
    }
    return query
      .orderBy("date_start")
      .orderBy("id")
      .limit(options.limit ?? 100)
      .offset(options.offset ?? 0)
      .execute();
  }

  async listCompetitionLevels(): Promise<string[]> {
    const rows = await this.db
      .selectFrom("competitions")
      .select("level")
      .distinct()
      .where("level", "is not", null)
      .orderBy("level")
      .execute();
    return rows.flatMap((row) => (row.level !== null ? [row.level] : []));
  }

  async listCompetitionIds(): Promise<string[]> {
    const rows = await this.db
      .selectFrom("competitions")
      .select("id")
      .orderBy("id")
      .execute();
    return rows.map((row) => row.id);
  }

  async listCompetitionSeries(id: string): Promise<CompetitionSeries[]> {
    return this.db
      .selectFrom("competition_series")
      .selectAll()
      .where("competition_id", "=", id)
      .orderBy("series_date")
      .orderBy("series_name")
      .execute();
  }

  async listRegistrations(id: string): Promise<Registration[]> {
    return this.db
      .selectFrom("registrations")
      .selectAll()
      .where("competition_id", "=", id)
      .orderBy("series_name")
      .orderBy("player_name")
      .execute();
  }

  async countCatalog(): Promise<CatalogCounts> {
    const count = async (
      table: "organizations" | "players" | "matches" | "competitions"
    ): Promise<number> => {
      const row = await this.db
        .selectFrom(table)
        .select(sql<number>`cast(count(*) as integer)`.as("count"))
        .executeTakeFirst();
      return Number(row?.count ?? 0);
    };

    const [clubs, players, matches, competitions] = await Promise.all([
      count("organizations"),
      count("players"),
      count("matches"),
      count("competitions"),
    ]);

    const active = await this.db
      .selectFrom("players")
      .select(sql<number>`cast(count(*) as integer)`.as("count"))
      .where((eb) =>
        eb.or([eb("points_current", "is not", null), eb("rank", "is not", null)])
      )
      .executeTakeFirst();

    const lastTask = await this.db
      .selectFrom("scrape_tasks")
      .select("finished_at")
      .where("status", "=", "success")
      .where("finished_at", "is not", null)
      .orderBy("finished_at", "desc")
      .limit(1)
      .executeTakeFirst();

    return {
      clubs,
      players,
      activePlayers: Number(active?.count ?? 0),
      matches,
      competitions,
      lastScrapeAt: lastTask?.finished_at ?? null,
    };
  }
}
