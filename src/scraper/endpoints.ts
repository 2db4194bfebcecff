/**
 * Upstream endpoint catalog
 *
 * The federation publishes its directory on one host (clubs, members,
 * player sheets) and its tournament calendar on another.
 */

import type { AppConfig } from "../config.js";

export type EndpointName =
  | "organization-list"
  | "organization-page"
  | "profile"
  | "profile-women"
  | "competition-list"
  | "competition-series"
  | "competition-registrations";

export interface Endpoint {
  url: string;
  method: "GET" | "POST";
  /** Query parameters sent with every call */
  fixedParams?: Record<string, string>;
}

export type EndpointCatalog = Record<EndpointName, Endpoint>;

export function buildEndpointCatalog(
  upstream: Pick<AppConfig["upstream"], "dataBaseUrl" | "resultsBaseUrl">
): EndpointCatalog {
  const data = upstream.dataBaseUrl.replace(/\/+$/, "");
  const results = upstream.resultsBaseUrl.replace(/\/+$/, "");

  return {
    "organization-list": {
      url: `${data}/interclubs/rankings.php`,
      method: "GET",
    },
    "organization-page": {
      url: `${data}/annuaire/membres.php`,
      method: "POST",
    },
    profile: {
      url: `${data}/tools/fiche.php`,
      method: "GET",
    },
    "profile-women": {
      url: `${data}/tools/fiche_women.php`,
      method: "GET",
    },
    "competition-list": {
      url: `${results}/`,
      method: "GET",
      fixedParams: { menu: "7" },
    },
    "competition-series": {
      url: `${results}/`,
      method: "GET",
      fixedParams: { menu: "7", viewseries: "1" },
    },
    "competition-registrations": {
      url: `${results}/`,
      method: "GET",
      fixedParams: { menu: "7", viewplayers: "1" },
    },
  };
}
