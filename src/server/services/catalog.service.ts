/**
 * Catalog Service - read-side queries shaped for the API
 */

import {
  paginate,
  parseLimit,
  type PaginatedResult,
} from "../../utils/pagination.js";
import { NotFoundError } from "../plugins/error-handler.js";

import type {
  Competition,
  CompetitionSeries,
  Match,
  OpponentStat,
  Organization,
  Player,
  Registration,
} from "../../db/types.js";
import type {
  PlayerFilter,
  ReconciliationStore,
} from "../../services/store/reconciliation.js";
import type {
  CatalogStatsDto,
  ClubDetailDto,
  ClubSummaryDto,
  CompetitionDetailDto,
  CompetitionSummaryDto,
  HeadToHeadDto,
  MatchDto,
  OpponentStatDto,
  PlayerDetailDto,
  PlayerListItemDto,
  PlayerSummaryDto,
  RegionDto,
} from "../../types/api.js";
import type { Bracket } from "../../types/index.js";

// ============================================================================
// Row mappers
// ============================================================================

const flag = (value: number | null): boolean | null =>
  value === null ? null : value !== 0;

function toClubSummary(row: Organization): ClubSummaryDto {
  return { code: row.code, name: row.name, region: row.region };
}

function toClubDetail(row: Organization): ClubDetailDto {
  return {
    ...toClubSummary(row),
    fullName: row.full_name,
    email: row.email,
    phone: row.phone,
    legalStatus: row.legal_status,
    website: row.website,
    hasShower: flag(row.has_shower),
    venue: {
      name: row.venue_name,
      address: row.venue_address,
      phone: row.venue_phone,
      accessible: flag(row.venue_accessible),
      remarks: row.venue_remarks,
    },
    teams: {
      men: row.teams_men,
      women: row.teams_women,
      youth: row.teams_youth,
      veterans: row.teams_veterans,
    },
    label: row.label,
    palette: row.palette,
    updatedAt: row.updated_at,
  };
}

function toPlayerSummary(row: Player): PlayerSummaryDto {
  return {
    licence: row.licence,
    name: row.name,
    rank: row.rank,
    category: row.category,
    clubCode: row.organization_code,
  };
}

function toPlayerListItem(row: Player): PlayerListItemDto {
  return { ...toPlayerSummary(row), pointsCurrent: row.points_current };
}

function toPlayerDetail(row: Player): PlayerDetailDto {
  const hasWomenSheet =
    row.women_rank !== null ||
    row.women_points_current !== null ||
    row.women_total_wins !== null;

  return {
    ...toPlayerSummary(row),
    points: { start: row.points_start, current: row.points_current },
    rankingPosition: row.ranking_position,
    totalWins: row.total_wins,
    totalLosses: row.total_losses,
    women: hasWomenSheet
      ? {
          rank: row.women_rank,
          pointsStart: row.women_points_start,
          pointsCurrent: row.women_points_current,
          totalWins: row.women_total_wins,
          totalLosses: row.women_total_losses,
        }
      : null,
    lastUpdate: row.last_update,
    updatedAt: row.updated_at,
  };
}

function toMatch(row: Match): MatchDto {
  return {
    key: row.match_key,
    bracket: row.bracket,
    date: row.match_date,
    division: row.division,
    opponent: {
      licence: row.opponent_licence,
      name: row.opponent_name,
      club: row.opponent_club,
      rank: row.opponent_rank,
      points: row.opponent_points,
    },
    score: row.score,
    won: flag(row.won),
    pointsDelta: row.points_delta,
  };
}

function toOpponentStat(row: OpponentStat): OpponentStatDto {
  return {
    bracket: row.bracket,
    bucket: row.bucket,
    wins: row.wins,
    losses: row.losses,
    ratio: row.ratio,
  };
}

function toCompetitionSummary(row: Competition): CompetitionSummaryDto {
  return {
    id: row.id,
    name: row.name,
    level: row.level,
    dateStart: row.date_start,
    dateEnd: row.date_end,
    reference: row.reference,
    seriesCount: row.series_count,
  };
}

function toCompetitionDetail(
  row: Competition,
  series: CompetitionSeries[],
  registrations: Registration[]
): CompetitionDetailDto {
  return {
    ...toCompetitionSummary(row),
    series: series.map((item) => ({
      name: item.series_name,
      date: item.series_date,
      startTime: item.start_time,
      entries: item.entries_count,
      maxEntries: item.entries_max,
    })),
    registrations: registrations.map((item) => ({
      series: item.series_name,
      licence: item.licence,
      playerName: item.player_name,
      clubName: item.organization_name,
      rank: item.rank,
    })),
  };
}

// ============================================================================
// Service
// ============================================================================

export interface ListClubsOptions {
  region?: string;
  search?: string;
  limit?: number;
  offset?: number;
}

export class CatalogService {
  constructor(private store: ReconciliationStore) {}

  async listClubs(
    options: ListClubsOptions = {}
  ): Promise<PaginatedResult<ClubSummaryDto>> {
    const limit = parseLimit(options.limit, 50, 500);
    const offset = options.offset ?? 0;
    const rows = await this.store.listOrganizations({
      region: options.region,
      search: options.search,
      limit: limit + 1,
      offset,
    });
    const page = paginate(rows, limit, offset);
    return { items: page.items.map(toClubSummary), pagination: page.pagination };
  }

  async listRegions(): Promise<RegionDto[]> {
    const rows = await this.store.listRegions();
    return rows.map((row) => ({ region: row.region, clubCount: row.count }));
  }

  async getClub(code: string): Promise<ClubDetailDto> {
    const row = await this.store.getOrganization(code);
    if (row === undefined) {
      throw new NotFoundError(`Club ${code} not found`);
    }
    return toClubDetail(row);
  }

  async listClubPlayers(code: string): Promise<PlayerSummaryDto[]> {
    await this.getClub(code);
    const rows = await this.store.listPlayersByOrganization(code);
    return rows.map(toPlayerSummary);
  }

  async listPlayers(
    options: PlayerFilter = {}
  ): Promise<PaginatedResult<PlayerListItemDto>> {
    const limit = parseLimit(options.limit, 100, 1000);
    const offset = options.offset ?? 0;
    const rows = await this.store.listPlayers({
      ...options,
      limit: limit + 1,
      offset,
    });
    const page = paginate(rows, limit, offset);
    return {
      items: page.items.map(toPlayerListItem),
      pagination: page.pagination,
    };
  }

  async getPlayer(licence: string): Promise<PlayerDetailDto> {
    const row = await this.store.getPlayer(licence);
    if (row === undefined) {
      throw new NotFoundError(`Player ${licence} not found`);
    }
    return toPlayerDetail(row);
  }

  async listMatches(
    licence: string,
    options: { bracket?: Bracket; limit?: number } = {}
  ): Promise<MatchDto[]> {
    await this.getPlayer(licence);
    const rows = await this.store.listMatches(licence, {
      bracket: options.bracket,
      limit: parseLimit(options.limit, 100, 500),
    });
    return rows.map(toMatch);
  }

  async listOpponentStats(
    licence: string,
    bracket?: Bracket
  ): Promise<OpponentStatDto[]> {
    await this.getPlayer(licence);
    const rows = await this.store.listOpponentStats(licence, bracket);
    return rows.map(toOpponentStat);
  }

  async getHeadToHead(
    licence: string,
    opponent: string
  ): Promise<HeadToHeadDto> {
    await this.getPlayer(licence);
    const summary = await this.store.getHeadToHead(licence, opponent);
    return { ...summary, matches: summary.matches.map(toMatch) };
  }

  async listCompetitions(
    options: { from?: string; limit?: number; offset?: number } = {}
  ): Promise<PaginatedResult<CompetitionSummaryDto>> {
    const limit = parseLimit(options.limit, 50, 500);
    const offset = options.offset ?? 0;
    const rows = await this.store.listCompetitions({
      from: options.from,
      limit: limit + 1,
      offset,
    });
    const page = paginate(rows, limit, offset);
    return {
      items: page.items.map(toCompetitionSummary),
      pagination: page.pagination,
    };
  }

  async listCompetitionLevels(): Promise<string[]> {
    return this.store.listCompetitionLevels();
  }

  async getCompetition(id: string): Promise<CompetitionDetailDto> {
    const row = await this.store.getCompetition(id);
    if (row === undefined) {
      throw new NotFoundError(`Competition ${id} not found`);
    }
    const [series, registrations] = await Promise.all([
      this.store.listCompetitionSeries(id),
      this.store.listRegistrations(id),
    ]);
    return toCompetitionDetail(row, series, registrations);
  }

  async getStats(): Promise<CatalogStatsDto> {
    return this.store.countCatalog();
  }
}
