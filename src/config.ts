/**
 * Application configuration, read once from the environment.
 */

import "dotenv/config";

import { TASK_KINDS, isTaskKind, type TaskKind } from "./types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

export interface AppConfig {
  database: {
    /** PostgreSQL connection string; SQLite is used when unset */
    url: string | null;
    path: string;
  };
  server: {
    host: string;
    port: number;
    corsOrigins: string[] | true;
  };
  upstream: {
    dataBaseUrl: string;
    resultsBaseUrl: string;
    userAgent: string;
    timeoutMs: number;
    retry: RetryConfig;
  };
  scrape: {
    /** Minimum spacing between two upstream calls of one task */
    pacingMs: number;
    /** Pause after each unit of work */
    unitDelayMs: number;
    includeWomenProfiles: boolean;
    maxLogEntries: number;
  };
  schedule: {
    intervalMinutes: number | null;
    kinds: TaskKind[];
  };
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Parsing helpers
// ============================================================================

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value === undefined || value === "" ? fallback : value;
}

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  options: { min?: number; integer?: boolean } = {}
): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  if (options.integer === true && !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new ConfigError(
      `${name} must be >= ${String(options.min)}, got ${String(value)}`
    );
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") {
    return fallback;
  }
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readKinds(env: Env, name: string, fallback: TaskKind[]): TaskKind[] {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === "") {
    return fallback;
  }

  const kinds: TaskKind[] = [];
  for (const part of raw.split(",")) {
    const kind = part.trim();
    if (kind === "") continue;
    if (!isTaskKind(kind)) {
      throw new ConfigError(
        `${name} contains unknown task kind "${kind}" (expected one of ${TASK_KINDS.join(", ")})`
      );
    }
    if (!kinds.includes(kind)) kinds.push(kind);
  }
  return kinds;
}

function readOrigins(env: Env): string[] | true {
  const raw = readString(env, "CORS_ORIGINS", "*");
  if (raw === "*") {
    return true;
  }
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin !== "");
}

// ============================================================================
// Loader
// ============================================================================

export function loadConfig(env: Env = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim();
  const scheduleMinutes = readNumber(env, "SCRAPE_SCHEDULE_MINUTES", 0, {
    min: 0,
  });

  return {
    database: {
      url: databaseUrl === undefined || databaseUrl === "" ? null : databaseUrl,
      path: readString(env, "DB_PATH", "./data/catalog.db"),
    },
    server: {
      host: readString(env, "HOST", "0.0.0.0"),
      port: readNumber(env, "PORT", 3000, { min: 0, integer: true }),
      corsOrigins: readOrigins(env),
    },
    upstream: {
      dataBaseUrl: readString(env, "UPSTREAM_DATA_URL", "https://data.aftt.be"),
      resultsBaseUrl: readString(
        env,
        "UPSTREAM_RESULTS_URL",
        "https://resultats.aftt.be"
      ),
      userAgent: readString(
        env,
        "SCRAPE_USER_AGENT",
        "Mozilla/5.0 (compatible; tt-catalog-sync/0.1)"
      ),
      timeoutMs: readNumber(env, "SCRAPE_TIMEOUT_MS", 30_000, { min: 1 }),
      retry: {
        maxAttempts: readNumber(env, "SCRAPE_MAX_ATTEMPTS", 3, {
          min: 1,
          integer: true,
        }),
        baseDelayMs: readNumber(env, "SCRAPE_RETRY_BASE_MS", 2000, { min: 0 }),
        multiplier: readNumber(env, "SCRAPE_RETRY_MULTIPLIER", 2, { min: 1 }),
        maxDelayMs: readNumber(env, "SCRAPE_RETRY_MAX_MS", 30_000, { min: 0 }),
      },
    },
    scrape: {
      pacingMs: readNumber(env, "SCRAPE_DELAY_MS", 300, { min: 0 }),
      unitDelayMs: readNumber(env, "SCRAPE_UNIT_DELAY_MS", 1000, { min: 0 }),
      includeWomenProfiles: readBoolean(env, "SCRAPE_WOMEN_PROFILES", true),
      maxLogEntries: readNumber(env, "TASK_LOG_LIMIT", 1000, {
        min: 1,
        integer: true,
      }),
    },
    schedule: {
      intervalMinutes: scheduleMinutes > 0 ? scheduleMinutes : null,
      kinds: readKinds(env, "SCRAPE_SCHEDULE_KINDS", [
        "organizations",
        "profiles-all",
      ]),
    },
  };
}
