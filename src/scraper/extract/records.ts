/**
 * Record constructors with every optional attribute absent
 */

import { absent } from "../../types/index.js";

import type {
  CompetitionRecord,
  OrganizationRecord,
  PlayerRecord,
} from "../../types/index.js";

export function organizationRecord(
  code: string,
  fields: Partial<Omit<OrganizationRecord, "kind" | "code">> = {}
): OrganizationRecord {
  return {
    kind: "organization",
    code,
    name: absent,
    region: absent,
    fullName: absent,
    email: absent,
    phone: absent,
    legalStatus: absent,
    website: absent,
    hasShower: absent,
    venueName: absent,
    venueAddress: absent,
    venuePhone: absent,
    venueAccessible: absent,
    venueRemarks: absent,
    teamsMen: absent,
    teamsWomen: absent,
    teamsYouth: absent,
    teamsVeterans: absent,
    label: absent,
    palette: absent,
    ...fields,
  };
}

export function playerRecord(
  licence: string,
  fields: Partial<Omit<PlayerRecord, "kind" | "licence">> = {}
): PlayerRecord {
  return {
    kind: "player",
    licence,
    name: absent,
    rank: absent,
    organizationCode: absent,
    category: absent,
    pointsStart: absent,
    pointsCurrent: absent,
    rankingPosition: absent,
    totalWins: absent,
    totalLosses: absent,
    womenRank: absent,
    womenPointsStart: absent,
    womenPointsCurrent: absent,
    womenTotalWins: absent,
    womenTotalLosses: absent,
    lastUpdate: absent,
    ...fields,
  };
}

export function competitionRecord(
  id: string,
  fields: Partial<Omit<CompetitionRecord, "kind" | "id">> = {}
): CompetitionRecord {
  return {
    kind: "competition",
    id,
    name: absent,
    level: absent,
    dateStart: absent,
    dateEnd: absent,
    reference: absent,
    seriesCount: absent,
    ...fields,
  };
}
