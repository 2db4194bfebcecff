import type { Bracket, ExtractedRecord } from "../../types/index.js";

export type DocumentKind =
  | "organization-list"
  | "organization-page"
  | "profile"
  | "competition-list"
  | "competition-series"
  | "competition-registrations";

export interface ExtractionContext {
  organizationCode?: string;
  licence?: string;
  bracket?: Bracket;
  competitionId?: string;
}

export interface Extraction {
  records: ExtractedRecord[];
  /** Rows dropped for a missing or malformed natural key */
  issues: string[];
}

/**
 * The document does not carry the layout expected for its kind
 */
export class ExtractionError extends Error {
  code = "EXTRACTION_ERROR" as const;

  constructor(
    message: string,
    readonly documentKind: DocumentKind
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}

export function requireContext(
  value: string | undefined,
  name: keyof ExtractionContext,
  kind: DocumentKind
): string {
  if (value === undefined || value === "") {
    throw new ExtractionError(`${kind} extraction needs ${name}`, kind);
  }
  return value;
}
