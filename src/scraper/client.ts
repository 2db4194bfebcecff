import { upstreamLogger } from "../logger.js";
import { errorMessage } from "../utils/errors.js";
import { sleep as defaultSleep, type Sleep } from "../utils/time.js";

import type { EndpointCatalog, EndpointName } from "./endpoints.js";
import type { RetryConfig } from "../config.js";

// ============================================================================
// Types
// ============================================================================

export type RetryPolicy = RetryConfig;

export interface UpstreamDocument {
  endpoint: EndpointName;
  url: string;
  status: number;
  body: string;
  fetchedAt: string;
}

export type FetchImpl = (
  input: string,
  init: RequestInit
) => Promise<Response>;

export interface UpstreamClientOptions {
  endpoints: EndpointCatalog;
  retry: RetryPolicy;
  timeoutMs: number;
  userAgent?: string;
  fetchImpl?: FetchImpl;
  sleep?: Sleep;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Every attempt failed with a network error, a timeout or a retryable status
 */
export class TransientUpstreamError extends Error {
  code = "UPSTREAM_TRANSIENT" as const;

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransientUpstreamError";
  }
}

/**
 * The upstream answered with a status that retrying will not change
 */
export class FatalUpstreamError extends Error {
  code = "UPSTREAM_FATAL" as const;

  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = "FatalUpstreamError";
  }
}

export type UpstreamError = TransientUpstreamError | FatalUpstreamError;

export function isUpstreamError(error: unknown): error is UpstreamError {
  return (
    error instanceof TransientUpstreamError ||
    error instanceof FatalUpstreamError
  );
}

// ============================================================================
// Retry helpers
// ============================================================================

/**
 * Delay before the given attempt (1-based). The first attempt never waits.
 */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 1) {
    return 0;
  }
  return Math.min(
    policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 2),
    policy.maxDelayMs
  );
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Resolve an endpoint and its parameters into a request
 */
export function buildRequest(
  endpoints: EndpointCatalog,
  endpoint: EndpointName,
  params: Record<string, string>
): { url: string; init: RequestInit } {
  const definition = endpoints[endpoint];
  const url = new URL(definition.url);

  for (const [key, value] of Object.entries(definition.fixedParams ?? {})) {
    url.searchParams.set(key, value);
  }

  if (definition.method === "GET") {
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return { url: url.toString(), init: { method: "GET" } };
  }

  return {
    url: url.toString(),
    init: {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams(params).toString(),
    },
  };
}

// ============================================================================
// Client
// ============================================================================

export class UpstreamClient {
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: Sleep;

  constructor(private readonly options: UpstreamClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Fetch one document, retrying transient failures with exponential backoff
   */
  async fetch(
    endpoint: EndpointName,
    params: Record<string, string> = {},
    timeoutMs: number = this.options.timeoutMs
  ): Promise<UpstreamDocument> {
    const { url, init } = buildRequest(this.options.endpoints, endpoint, params);
    const { retry } = this.options;
    const headers = new Headers(init.headers);
    if (this.options.userAgent !== undefined) {
      headers.set("User-Agent", this.options.userAgent);
    }

    let lastError: unknown = undefined;

    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = retryDelay(retry, attempt);
        upstreamLogger.debug(
          { endpoint, attempt, delay },
          "Backing off before retry"
        );
        await this.sleep(delay);
      }

      const method = init.method ?? "GET";
      upstreamLogger.debug({ method, url, attempt }, "Sending upstream request");

      const startTime = performance.now();
      let response: Response;
      let body: string;
      try {
        response = await this.fetchImpl(url, {
          ...init,
          headers,
          signal: AbortSignal.timeout(timeoutMs),
        });
        body = await response.text();
      } catch (error) {
        lastError = error;
        upstreamLogger.warn(
          { endpoint, url, attempt, error: errorMessage(error) },
          "Upstream request failed"
        );
        continue;
      }
      const duration = Math.round(performance.now() - startTime);

      upstreamLogger.debug(
        {
          method,
          url,
          status: response.status,
          duration: `${String(duration)}ms`,
        },
        "Received upstream response"
      );

      if (response.ok) {
        return {
          endpoint,
          url,
          status: response.status,
          body,
          fetchedAt: new Date().toISOString(),
        };
      }

      if (!isRetryableStatus(response.status)) {
        upstreamLogger.error(
          { endpoint, url, status: response.status },
          "Upstream rejected request"
        );
        throw new FatalUpstreamError(
          `${endpoint} returned HTTP ${String(response.status)}`,
          response.status
        );
      }

      lastError = new Error(`HTTP ${String(response.status)}`);
      upstreamLogger.warn(
        { endpoint, url, attempt, status: response.status },
        "Upstream returned a retryable status"
      );
    }

    throw new TransientUpstreamError(
      `${endpoint} failed after ${String(retry.maxAttempts)} attempts: ${errorMessage(lastError)}`,
      retry.maxAttempts,
      { cause: lastError }
    );
  }
}
