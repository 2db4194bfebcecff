import { blockLines, keyValueLines, readCards, readTables } from "./html.js";
import { playerRecord, organizationRecord } from "./records.js";
import { parseCodeAndName, parseInteger, parseYesNo } from "./text.js";
import { ExtractionError, requireContext } from "./types.js";
import { absent, fieldOf, present, textField } from "../../types/index.js";

import type { Extraction, ExtractionContext } from "./types.js";
import type {
  ExtractedRecord,
  OrganizationRecord,
  PlayerRecord,
} from "../../types/index.js";
import type * as cheerio from "cheerio";

// ============================================================================
// Club selector
// ============================================================================

function readClubOptions(
  $: cheerio.CheerioAPI
): Array<{ value: string; code: string; name: string }> {
  const options: Array<{ value: string; code: string; name: string }> = [];
  $("select option").each((_, option) => {
    const $option = $(option);
    const parsed = parseCodeAndName($option.text());
    if (parsed === null) {
      return;
    }
    options.push({ value: ($option.attr("value") ?? "").trim(), ...parsed });
  });
  return options;
}

/**
 * Club directory: one organization per "CODE - NAME" selector option
 */
export function extractOrganizationList($: cheerio.CheerioAPI): Extraction {
  if ($("select").length === 0) {
    throw new ExtractionError(
      "No club selector found on the page",
      "organization-list"
    );
  }

  const seen = new Set<string>();
  const records: ExtractedRecord[] = [];
  for (const option of readClubOptions($)) {
    if (seen.has(option.code)) continue;
    seen.add(option.code);
    records.push(
      organizationRecord(option.code, { name: present(option.name) })
    );
  }

  return { records, issues: [] };
}

// ============================================================================
// Club page: details and members
// ============================================================================

type ClubDetails = Partial<Omit<OrganizationRecord, "kind" | "code">>;

function readClubDetails($: cheerio.CheerioAPI): ClubDetails {
  const details: ClubDetails = {};

  for (const card of readCards($)) {
    const header = card.header.toLowerCase();
    const pairs = keyValueLines(blockLines(card.bodyHtml));

    if (header.includes("informations du club")) {
      details.fullName = textField(card.title);
      details.website = textField(card.link);
      for (const { key, value } of pairs) {
        if (key.includes("email")) {
          details.email = textField(value);
        } else if (
          key.includes("phone") ||
          key.includes("téléphone") ||
          key.includes("tel")
        ) {
          details.phone = textField(value);
        } else if (key.includes("statut")) {
          details.legalStatus = textField(value);
        } else if (key.includes("douche")) {
          details.hasShower = fieldOf(parseYesNo(value));
        }
      }
    } else if (header.includes("locaux du club")) {
      for (const { key, value } of pairs) {
        if (key === "nom") {
          details.venueName = textField(value);
        } else if (key.includes("adresse")) {
          details.venueAddress = textField(value);
        } else if (
          key.includes("phone") ||
          key.includes("téléphone") ||
          key.includes("tel")
        ) {
          details.venuePhone = textField(value);
        } else if (key.includes("pmr") || key.includes("accès")) {
          details.venueAccessible = fieldOf(parseYesNo(value));
        } else if (key.includes("remarque")) {
          details.venueRemarks = textField(value);
        }
      }
    } else if (header.includes("quipes du club")) {
      for (const { key, value } of pairs) {
        const count = fieldOf(parseInteger(value));
        if (key.includes("messieurs")) {
          details.teamsMen = count;
        } else if (key.includes("dames")) {
          details.teamsWomen = count;
        } else if (key.includes("jeunes")) {
          details.teamsYouth = count;
        } else if (key.includes("térans") || key.includes("terans")) {
          details.teamsVeterans = count;
        }
      }
    } else if (
      header.includes("labellisation") ||
      header.includes("palette")
    ) {
      for (const { key, value } of pairs) {
        if (key.includes("palette")) {
          details.palette = /aucune?/i.test(value) ? absent : textField(value);
        } else if (key.includes("label")) {
          details.label = /^aucune?$/i.test(value) ? absent : textField(value);
        }
      }
    }
  }

  return details;
}

/**
 * Members table, with or without a leading position column
 */
function readMembers(
  $: cheerio.CheerioAPI,
  organizationCode: string
): { players: PlayerRecord[]; issues: string[]; tableFound: boolean } {
  const players: PlayerRecord[] = [];
  const issues: string[] = [];
  const seen = new Set<string>();
  let tableFound = false;

  for (const table of readTables($)) {
    for (const row of table.rows) {
      const { cells } = row;
      if (cells.length < 4) continue;
      tableFound = true;

      const [licence = "", name = "", category = "", rank = ""] =
        cells.length >= 5 ? cells.slice(1, 5) : cells;

      if (cells.every((cell) => cell === "")) continue;
      if (!/\d/.test(licence)) {
        issues.push(
          `member "${name}" of ${organizationCode} dropped: invalid licence "${licence}"`
        );
        continue;
      }
      if (seen.has(licence)) continue;
      seen.add(licence);

      players.push(
        playerRecord(licence, {
          name: textField(name),
          category: textField(category),
          rank: textField(rank),
          organizationCode: present(organizationCode),
        })
      );
    }
  }

  return { players, issues, tableFound };
}

export function extractOrganizationPage(
  $: cheerio.CheerioAPI,
  context: ExtractionContext
): Extraction {
  const code = requireContext(
    context.organizationCode,
    "organizationCode",
    "organization-page"
  );
  const details = readClubDetails($);
  const { players, issues, tableFound } = readMembers($, code);

  if (!tableFound && Object.keys(details).length === 0) {
    throw new ExtractionError(
      `No member table or club details found for ${code}`,
      "organization-page"
    );
  }

  const option = readClubOptions($).find(
    (candidate) => candidate.value === code || candidate.code === code
  );

  const organization = organizationRecord(code, {
    ...details,
    name: option !== undefined ? present(option.name) : absent,
  });

  return { records: [organization, ...players], issues };
}
