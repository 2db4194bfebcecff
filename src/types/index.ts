// Domain types shared by the extractor, the store and the task runner

// =====================
// Field values
// =====================

/**
 * An attribute read from an upstream document. `absent` means the document
 * did not carry the value, which is different from carrying an empty one.
 */
export type Field<T> = { present: true; value: T } | { present: false };

export const absent: Field<never> = { present: false };

export function present<T>(value: T): Field<T> {
  return { present: true, value };
}

/** Present when the value is neither null nor undefined */
export function fieldOf<T>(value: T | null | undefined): Field<T> {
  return value === null || value === undefined ? absent : present(value);
}

/** Trimmed text, absent when empty */
export function textField(value: string | null | undefined): Field<string> {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === "" ? absent : present(trimmed);
}

// =====================
// Extracted records
// =====================

export type Bracket = "men" | "women";

export interface OrganizationRecord {
  kind: "organization";
  code: string;
  name: Field<string>;
  region: Field<string>;
  fullName: Field<string>;
  email: Field<string>;
  phone: Field<string>;
  legalStatus: Field<string>;
  website: Field<string>;
  hasShower: Field<boolean>;
  venueName: Field<string>;
  venueAddress: Field<string>;
  venuePhone: Field<string>;
  venueAccessible: Field<boolean>;
  venueRemarks: Field<string>;
  teamsMen: Field<number>;
  teamsWomen: Field<number>;
  teamsYouth: Field<number>;
  teamsVeterans: Field<number>;
  label: Field<string>;
  palette: Field<string>;
}

export interface PlayerRecord {
  kind: "player";
  licence: string;
  name: Field<string>;
  rank: Field<string>;
  organizationCode: Field<string>;
  category: Field<string>;
  pointsStart: Field<number>;
  pointsCurrent: Field<number>;
  rankingPosition: Field<number>;
  totalWins: Field<number>;
  totalLosses: Field<number>;
  womenRank: Field<string>;
  womenPointsStart: Field<number>;
  womenPointsCurrent: Field<number>;
  womenTotalWins: Field<number>;
  womenTotalLosses: Field<number>;
  lastUpdate: Field<string>;
}

export interface MatchRecord {
  kind: "match";
  playerLicence: string;
  bracket: Bracket;
  /** ISO date */
  date: string;
  division: Field<string>;
  opponentClub: Field<string>;
  opponentName: Field<string>;
  opponentLicence: Field<string>;
  opponentRank: Field<string>;
  opponentPoints: Field<number>;
  score: Field<string>;
  won: Field<boolean>;
  pointsDelta: Field<number>;
}

export interface OpponentStatRecord {
  kind: "opponent-stat";
  playerLicence: string;
  bracket: Bracket;
  bucket: string;
  wins: number;
  losses: number;
  ratio: Field<number>;
}

export interface CompetitionRecord {
  kind: "competition";
  id: string;
  name: Field<string>;
  level: Field<string>;
  dateStart: Field<string>;
  dateEnd: Field<string>;
  reference: Field<string>;
  seriesCount: Field<number>;
}

export interface CompetitionSeriesRecord {
  kind: "competition-series";
  competitionId: string;
  seriesName: string;
  seriesDate: Field<string>;
  startTime: Field<string>;
  entriesCount: Field<number>;
  entriesMax: Field<number>;
}

export interface RegistrationRecord {
  kind: "registration";
  competitionId: string;
  seriesName: string;
  licence: string;
  playerName: Field<string>;
  organizationName: Field<string>;
  rank: Field<string>;
}

export type ExtractedRecord =
  | OrganizationRecord
  | PlayerRecord
  | MatchRecord
  | OpponentStatRecord
  | CompetitionRecord
  | CompetitionSeriesRecord
  | RegistrationRecord;

export type RecordKind = ExtractedRecord["kind"];

// =====================
// Tasks
// =====================

export const TASK_KINDS = [
  "organizations",
  "profiles-all",
  "competitions",
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

export type TaskStatus = "running" | "success" | "failed" | "cancelled";

export type TaskTrigger = "manual" | "scheduled";

/** Applied merges per record kind, plus `rejected` */
export type TaskCounters = Partial<Record<RecordKind | "rejected", number>>;

export interface TaskLogEntry {
  timestamp: string;
  message: string;
}
