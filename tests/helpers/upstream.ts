/**
 * In-process stand-in for the federation sites, behind the real client
 */

import { UpstreamClient } from "../../src/scraper/client.js";
import { buildEndpointCatalog } from "../../src/scraper/endpoints.js";

import type { AppConfig } from "../../src/config.js";

export const DATA_URL = "https://data.example.test";
export const RESULTS_URL = "https://results.example.test";

export interface UpstreamRequest {
  path: string;
  query: URLSearchParams;
  form: URLSearchParams;
}

export type Route = (request: UpstreamRequest) => Response | Promise<Response>;

export const html = (body: string, status = 200): Response =>
  new Response(body, {
    status,
    headers: { "Content-Type": "text/html; charset=utf-8" },
  });

export function createUpstream(route: Route): {
  client: UpstreamClient;
  requests: UpstreamRequest[];
} {
  const requests: UpstreamRequest[] = [];
  const client = new UpstreamClient({
    endpoints: buildEndpointCatalog({
      dataBaseUrl: DATA_URL,
      resultsBaseUrl: RESULTS_URL,
    }),
    retry: { maxAttempts: 3, baseDelayMs: 1, multiplier: 2, maxDelayMs: 10 },
    timeoutMs: 1000,
    fetchImpl: async (input, init) => {
      const url = new URL(input);
      const request = {
        path: url.pathname,
        query: url.searchParams,
        form: new URLSearchParams(typeof init.body === "string" ? init.body : ""),
      };
      requests.push(request);
      return route(request);
    },
    sleep: async () => {},
  });
  return { client, requests };
}

export const testSettings: AppConfig["scrape"] = {
  pacingMs: 0,
  unitDelayMs: 0,
  includeWomenProfiles: false,
  maxLogEntries: 1000,
};

/**
 * Promise resolved from the outside
 */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
