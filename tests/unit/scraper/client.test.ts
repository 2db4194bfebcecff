import { describe, it, expect, vi } from "vitest";

import {
  buildRequest,
  FatalUpstreamError,
  isRetryableStatus,
  isUpstreamError,
  retryDelay,
  TransientUpstreamError,
  UpstreamClient,
  type FetchImpl,
} from "../../../src/scraper/client.js";
import { buildEndpointCatalog } from "../../../src/scraper/endpoints.js";

const endpoints = buildEndpointCatalog({
  dataBaseUrl: "https://data.example.test/",
  resultsBaseUrl: "https://results.example.test",
});

const retry = {
  maxAttempts: 3,
  baseDelayMs: 100,
  multiplier: 2,
  maxDelayMs: 1000,
};

function respond(status: number, body = ""): Response {
  return new Response(body, { status });
}

describe("scraper/client", () => {
  // ============================================================================
  // Pure helpers
  // ============================================================================

  describe("retryDelay", () => {
    it("should not wait before the first attempt", () => {
      expect(retryDelay(retry, 1)).toBe(0);
    });

    it("should grow exponentially from the base delay", () => {
      expect(retryDelay(retry, 2)).toBe(100);
      expect(retryDelay(retry, 3)).toBe(200);
      expect(retryDelay(retry, 4)).toBe(400);
    });

    it("should cap the delay", () => {
      expect(retryDelay(retry, 10)).toBe(1000);
    });
  });

  describe("isRetryableStatus", () => {
    it("should retry timeouts, throttling and server errors", () => {
      expect(isRetryableStatus(408)).toBe(true);
      expect(isRetryableStatus(429)).toBe(true);
      expect(isRetryableStatus(500)).toBe(true);
      expect(isRetryableStatus(503)).toBe(true);
    });

    it("should not retry client errors", () => {
      expect(isRetryableStatus(400)).toBe(false);
      expect(isRetryableStatus(404)).toBe(false);
    });
  });

  describe("buildRequest", () => {
    it("should put GET parameters after the fixed ones", () => {
      const request = buildRequest(endpoints, "competition-series", {
        t_id: "42",
      });

      expect(request.url).toBe(
        "https://results.example.test/?menu=7&viewseries=1&t_id=42"
      );
      expect(request.init.method).toBe("GET");
    });

    it("should strip trailing slashes from base URLs", () => {
      const request = buildRequest(endpoints, "profile", { licenceID: "123" });

      expect(request.url).toBe(
        "https://data.example.test/tools/fiche.php?licenceID=123"
      );
    });

    it("should send POST parameters as a form body", () => {
      const request = buildRequest(endpoints, "organization-page", {
        indice: "H004",
      });

      expect(request.url).toBe("https://data.example.test/annuaire/membres.php");
      expect(request.init.method).toBe("POST");
      expect(request.init.body).toBe("indice=H004");
      expect(request.init.headers).toEqual({
        "Content-Type": "application/x-www-form-urlencoded",
      });
    });
  });

  // ============================================================================
  // Client
  // ============================================================================

  describe("UpstreamClient.fetch", () => {
    function createClient(fetchImpl: FetchImpl) {
      const sleep = vi.fn(async (_ms: number) => {});
      const client = new UpstreamClient({
        endpoints,
        retry,
        timeoutMs: 1000,
        userAgent: "test-agent",
        fetchImpl,
        sleep,
      });
      return { client, sleep };
    }

    it("should return the document on success", async () => {
      const fetchImpl = vi.fn<FetchImpl>(async () => respond(200, "<html/>"));
      const { client, sleep } = createClient(fetchImpl);

      const document = await client.fetch("organization-list");

      expect(document.endpoint).toBe("organization-list");
      expect(document.status).toBe(200);
      expect(document.body).toBe("<html/>");
      expect(document.url).toBe(
        "https://data.example.test/interclubs/rankings.php"
      );
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("should send the user agent", async () => {
      const fetchImpl = vi.fn<FetchImpl>(async () => respond(200));
      const { client } = createClient(fetchImpl);

      await client.fetch("organization-list");

      const init = fetchImpl.mock.calls[0]?.[1];
      expect(new Headers(init?.headers).get("User-Agent")).toBe("test-agent");
    });

    it("should retry transient failures with backoff", async () => {
      const fetchImpl = vi
        .fn<FetchImpl>()
        .mockRejectedValueOnce(new Error("socket hang up"))
        .mockResolvedValueOnce(respond(503))
        .mockResolvedValueOnce(respond(200, "ok"));
      const { client, sleep } = createClient(fetchImpl);

      const document = await client.fetch("profile", { licenceID: "1" });

      expect(document.body).toBe("ok");
      expect(fetchImpl).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[100], [200]]);
    });

    it("should give up after the last attempt", async () => {
      const fetchImpl = vi.fn<FetchImpl>(async () => respond(502));
      const { client } = createClient(fetchImpl);

      const error = await client.fetch("organization-list").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientUpstreamError);
      expect(isUpstreamError(error)).toBe(true);
      if (error instanceof TransientUpstreamError) {
        expect(error.attempts).toBe(3);
        expect(error.message).toBe(
          "organization-list failed after 3 attempts: HTTP 502"
        );
      }
      expect(fetchImpl).toHaveBeenCalledTimes(3);
    });

    it("should fail at once on a non-retryable status", async () => {
      const fetchImpl = vi.fn<FetchImpl>(async () => respond(404));
      const { client, sleep } = createClient(fetchImpl);

      const error = await client.fetch("profile").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FatalUpstreamError);
      if (error instanceof FatalUpstreamError) {
        expect(error.status).toBe(404);
        expect(error.message).toBe("profile returned HTTP 404");
      }
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});
