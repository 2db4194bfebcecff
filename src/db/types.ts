import type { Generated, Insertable, Selectable } from "kysely";

// ============================================================================
// Entity Tables
// ============================================================================

export interface OrganizationsTable {
  code: string;
  name: string | null;
  region: string | null;
  full_name: string | null;
  email: string | null;
  phone: string | null;
  legal_status: string | null;
  website: string | null;
  has_shower: number | null; // boolean (0/1)
  venue_name: string | null;
  venue_address: string | null;
  venue_phone: string | null;
  venue_accessible: number | null; // boolean (0/1)
  venue_remarks: string | null;
  teams_men: number | null;
  teams_women: number | null;
  teams_youth: number | null;
  teams_veterans: number | null;
  label: string | null;
  palette: string | null;
  updated_at: string;
}

export interface PlayersTable {
  licence: string;
  name: string | null;
  rank: string | null;
  organization_code: string | null;
  category: string | null;
  points_start: number | null;
  points_current: number | null;
  ranking_position: number | null;
  total_wins: number | null;
  total_losses: number | null;
  women_rank: string | null;
  women_points_start: number | null;
  women_points_current: number | null;
  women_total_wins: number | null;
  women_total_losses: number | null;
  last_update: string | null;
  updated_at: string;
}

export interface MatchesTable {
  match_key: string;
  player_licence: string;
  bracket: string;
  match_date: string;
  division: string | null;
  opponent_club: string | null;
  opponent_name: string | null;
  opponent_licence: string | null;
  opponent_rank: string | null;
  opponent_points: number | null;
  score: string | null;
  won: number | null; // boolean (0/1)
  points_delta: number | null;
  updated_at: string;
}

export interface OpponentStatsTable {
  player_licence: string;
  bracket: string;
  bucket: string;
  wins: number;
  losses: number;
  ratio: number | null;
  updated_at: string;
}

export interface CompetitionsTable {
  id: string;
  name: string | null;
  level: string | null;
  date_start: string | null;
  date_end: string | null;
  reference: string | null;
  series_count: number | null;
  updated_at: string;
}

export interface CompetitionSeriesTable {
  competition_id: string;
  series_name: string;
  series_date: string | null;
  start_time: string | null;
  entries_count: number | null;
  entries_max: number | null;
  updated_at: string;
}

export interface RegistrationsTable {
  competition_id: string;
  series_name: string;
  licence: string;
  player_name: string | null;
  organization_name: string | null;
  rank: string | null;
  updated_at: string;
}

// ============================================================================
// Task Ledger Tables
// ============================================================================

export interface ScrapeTasksTable {
  id: Generated<number>;
  kind: string;
  status: string;
  trigger: string;
  started_at: string;
  finished_at: string | null;
  total_units: number;
  completed_units: number;
  current_unit: string | null;
  counters: string; // JSON object
  errors: string; // JSON array of strings
}

export interface TaskLogsTable {
  id: Generated<number>;
  task_id: number;
  seq: number;
  logged_at: string;
  message: string;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  organizations: OrganizationsTable;
  players: PlayersTable;
  matches: MatchesTable;
  opponent_stats: OpponentStatsTable;
  competitions: CompetitionsTable;
  competition_series: CompetitionSeriesTable;
  registrations: RegistrationsTable;
  scrape_tasks: ScrapeTasksTable;
  task_logs: TaskLogsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type Organization = Selectable<OrganizationsTable>;
export type NewOrganization = Insertable<OrganizationsTable>;

export type Player = Selectable<PlayersTable>;
export type NewPlayer = Insertable<PlayersTable>;

export type Match = Selectable<MatchesTable>;
export type NewMatch = Insertable<MatchesTable>;

export type OpponentStat = Selectable<OpponentStatsTable>;
export type NewOpponentStat = Insertable<OpponentStatsTable>;

export type Competition = Selectable<CompetitionsTable>;
export type NewCompetition = Insertable<CompetitionsTable>;

export type CompetitionSeries = Selectable<CompetitionSeriesTable>;
export type NewCompetitionSeries = Insertable<CompetitionSeriesTable>;

export type Registration = Selectable<RegistrationsTable>;
export type NewRegistration = Insertable<RegistrationsTable>;

export type ScrapeTask = Selectable<ScrapeTasksTable>;
export type NewScrapeTask = Insertable<ScrapeTasksTable>;

export type TaskLog = Selectable<TaskLogsTable>;
export type NewTaskLog = Insertable<TaskLogsTable>;

export type SqlDialectName = "sqlite" | "postgres";
