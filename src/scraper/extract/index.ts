/**
 * Entity Extractor - turns one fetched document into typed records
 */

import * as cheerio from "cheerio";

import {
  countPages,
  extractCompetitionList,
  extractCompetitionRegistrations,
  extractCompetitionSeries,
} from "./competitions.js";
import {
  extractOrganizationList,
  extractOrganizationPage,
} from "./organizations.js";
import { extractProfile } from "./profiles.js";

import type {
  DocumentKind,
  Extraction,
  ExtractionContext,
} from "./types.js";

export function extract(
  document: string,
  kind: DocumentKind,
  context: ExtractionContext = {}
): Extraction {
  const $ = cheerio.load(document);

  switch (kind) {
    case "organization-list":
      return extractOrganizationList($);
    case "organization-page":
      return extractOrganizationPage($, context);
    case "profile":
      return extractProfile($, context);
    case "competition-list":
      return extractCompetitionList($);
    case "competition-series":
      return extractCompetitionSeries($, context);
    case "competition-registrations":
      return extractCompetitionRegistrations($, context);
  }
}

/**
 * Number of pages of a paginated tournament list
 */
export function extractPageCount(document: string): number {
  return countPages(cheerio.load(document));
}

export { ExtractionError } from "./types.js";
export type { DocumentKind, Extraction, ExtractionContext } from "./types.js";
