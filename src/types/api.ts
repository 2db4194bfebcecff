/**
 * API Request/Response Types
 */

import type { PaginationMeta } from "../utils/pagination.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
  meta?: {
    pagination?: PaginationMeta;
  };
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Club Types
// ============================================================================

export interface ClubSummaryDto {
  code: string;
  name: string | null;
  region: string | null;
}

export interface ClubDetailDto extends ClubSummaryDto {
  fullName: string | null;
  email: string | null;
  phone: string | null;
  legalStatus: string | null;
  website: string | null;
  hasShower: boolean | null;
  venue: {
    name: string | null;
    address: string | null;
    phone: string | null;
    accessible: boolean | null;
    remarks: string | null;
  };
  teams: {
    men: number | null;
    women: number | null;
    youth: number | null;
    veterans: number | null;
  };
  label: string | null;
  palette: string | null;
  updatedAt: string;
}

export interface RegionDto {
  region: string;
  clubCount: number;
}

// ============================================================================
// Player Types
// ============================================================================

export interface PlayerSummaryDto {
  licence: string;
  name: string | null;
  rank: string | null;
  category: string | null;
  clubCode: string | null;
}

export interface PlayerListItemDto extends PlayerSummaryDto {
  pointsCurrent: number | null;
}

export interface PlayerDetailDto extends PlayerSummaryDto {
  points: {
    start: number | null;
    current: number | null;
  };
  rankingPosition: number | null;
  totalWins: number | null;
  totalLosses: number | null;
  women: {
    rank: string | null;
    pointsStart: number | null;
    pointsCurrent: number | null;
    totalWins: number | null;
    totalLosses: number | null;
  } | null;
  lastUpdate: string | null;
  updatedAt: string;
}

export interface MatchDto {
  key: string;
  bracket: string;
  date: string;
  division: string | null;
  opponent: {
    licence: string | null;
    name: string | null;
    club: string | null;
    rank: string | null;
    points: number | null;
  };
  score: string | null;
  won: boolean | null;
  pointsDelta: number | null;
}

export interface OpponentStatDto {
  bracket: string;
  bucket: string;
  wins: number;
  losses: number;
  ratio: number | null;
}

export interface HeadToHeadDto {
  playerLicence: string;
  opponentLicence: string;
  played: number;
  wins: number;
  losses: number;
  matches: MatchDto[];
}

// ============================================================================
// Competition Types
// ============================================================================

export interface CompetitionSummaryDto {
  id: string;
  name: string | null;
  level: string | null;
  dateStart: string | null;
  dateEnd: string | null;
  reference: string | null;
  seriesCount: number | null;
}

export interface CompetitionSeriesDto {
  name: string;
  date: string | null;
  startTime: string | null;
  entries: number | null;
  maxEntries: number | null;
}

export interface RegistrationDto {
  series: string;
  licence: string;
  playerName: string | null;
  clubName: string | null;
  rank: string | null;
}

export interface CompetitionDetailDto extends CompetitionSummaryDto {
  series: CompetitionSeriesDto[];
  registrations: RegistrationDto[];
}

// ============================================================================
// Catalog Counters
// ============================================================================

export interface CatalogStatsDto {
  clubs: number;
  players: number;
  activePlayers: number;
  matches: number;
  competitions: number;
  lastScrapeAt: string | null;
}
