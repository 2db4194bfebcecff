/**
 * Task plans - how each task kind enumerates and processes its units
 */

import {
  extract,
  extractPageCount,
  ExtractionError,
  type Extraction,
} from "../../scraper/extract/index.js";
import { isUpstreamError } from "../../scraper/client.js";
import { errorMessage } from "../../utils/errors.js";

import type { UpstreamDocument } from "../../scraper/client.js";
import type { EndpointName } from "../../scraper/endpoints.js";
import type { TaskKind } from "../../types/index.js";
import type { ReconciliationStore } from "../store/reconciliation.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What a plan may do while it runs, provided by the orchestrator
 */
export interface PlanContext {
  /** Paced upstream fetch */
  fetch(
    endpoint: EndpointName,
    params?: Record<string, string>
  ): Promise<UpstreamDocument>;
  /** Merge extracted records and record extraction issues under a label */
  apply(label: string, extraction: Extraction): Promise<void>;
  /** Non-fatal problem inside a unit */
  issue(label: string, message: string): void;
  log(message: string): void;
}

export interface WorkUnit {
  label: string;
  run(): Promise<void>;
}

/**
 * Enumerates the task's units. A throw here fails the whole task.
 */
export type TaskPlan = (context: PlanContext) => Promise<WorkUnit[]>;

export interface PlanOptions {
  store: Pick<ReconciliationStore, "listPlayerLicences">;
  includeWomenProfiles: boolean;
}

// ============================================================================
// Organizations
// ============================================================================

const organizationsPlan: TaskPlan = async (context) => {
  const listing = await context.fetch("organization-list");
  const extraction = extract(listing.body, "organization-list");
  await context.apply("organization list", extraction);

  const codes = extraction.records.flatMap((record) =>
    record.kind === "organization" ? [record.code] : []
  );
  context.log(`Found ${String(codes.length)} organizations`);

  return codes.map((code) => {
    const label = `organization ${code}`;
    return {
      label,
      run: async () => {
        const page = await context.fetch("organization-page", { indice: code });
        await context.apply(
          label,
          extract(page.body, "organization-page", { organizationCode: code })
        );
      },
    };
  });
};

// ============================================================================
// Player profiles
// ============================================================================

async function applyWomenSheet(
  context: PlanContext,
  label: string,
  licence: string
): Promise<void> {
  let sheet: UpstreamDocument;
  try {
    sheet = await context.fetch("profile-women", { licenceID: licence });
  } catch (error) {
    if (!isUpstreamError(error)) throw error;
    context.issue(label, `women's sheet: ${errorMessage(error)}`);
    return;
  }

  let extraction: Extraction;
  try {
    extraction = extract(sheet.body, "profile", { licence, bracket: "women" });
  } catch (error) {
    if (!(error instanceof ExtractionError)) throw error;
    // Most players have no women's sheet
    context.log(`${label}: no women's sheet`);
    return;
  }

  if (extraction.records.some((record) => record.kind === "match")) {
    await context.apply(label, extraction);
  }
}

function profilesPlan(options: PlanOptions): TaskPlan {
  return async (context) => {
    const licences = await options.store.listPlayerLicences();
    context.log(`Found ${String(licences.length)} stored players`);

    return licences.map((licence) => {
      const label = `player ${licence}`;
      return {
        label,
        run: async () => {
          const sheet = await context.fetch("profile", { licenceID: licence });
          await context.apply(
            label,
            extract(sheet.body, "profile", { licence, bracket: "men" })
          );
          if (options.includeWomenProfiles) {
            await applyWomenSheet(context, label, licence);
          }
        },
      };
    });
  };
}

// ============================================================================
// Competitions
// ============================================================================

const competitionsPlan: TaskPlan = async (context) => {
  const first = await context.fetch("competition-list");
  const pages = extractPageCount(first.body);
  const listings = [extract(first.body, "competition-list")];

  for (let page = 2; page <= pages; page++) {
    const document = await context.fetch("competition-list", {
      cur_page: String(page),
    });
    listings.push(extract(document.body, "competition-list"));
  }

  const ids: string[] = [];
  for (const [index, listing] of listings.entries()) {
    await context.apply(`tournament list page ${String(index + 1)}`, listing);
    for (const record of listing.records) {
      if (record.kind === "competition" && !ids.includes(record.id)) {
        ids.push(record.id);
      }
    }
  }
  context.log(
    `Found ${String(ids.length)} tournaments on ${String(pages)} pages`
  );

  return ids.map((id) => {
    const label = `tournament ${id}`;
    return {
      label,
      run: async () => {
        const series = await context.fetch("competition-series", { t_id: id });
        await context.apply(
          label,
          extract(series.body, "competition-series", { competitionId: id })
        );

        const registrations = await context.fetch(
          "competition-registrations",
          { t_id: id }
        );
        try {
          await context.apply(
            label,
            extract(registrations.body, "competition-registrations", {
              competitionId: id,
            })
          );
        } catch (error) {
          if (!(error instanceof ExtractionError)) throw error;
          // Tournaments without entries have no registration table
          context.log(`${label}: no registrations`);
        }
      },
    };
  });
};

// ============================================================================
// Plan selection
// ============================================================================

export function buildPlan(kind: TaskKind, options: PlanOptions): TaskPlan {
  switch (kind) {
    case "organizations":
      return organizationsPlan;
    case "profiles-all":
      return profilesPlan(options);
    case "competitions":
      return competitionsPlan;
  }
}
