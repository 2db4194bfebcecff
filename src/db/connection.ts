import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database, SqlDialectName } from "./types.js";
import type { AppConfig } from "../config.js";

const { Pool } = pg;

// ============================================================================
// Types
// ============================================================================

export interface DatabaseHandle {
  db: Kysely<Database>;
  dialect: SqlDialectName;
  /** Connection target for display, password masked */
  target: string;
}

// ============================================================================
// Factory
// ============================================================================

function createPostgres(url: string): DatabaseHandle {
  const pool = new Pool({
    connectionString: url,
    max: 10, // Maximum pool connections
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Connection timeout
  });

  return {
    db: new Kysely<Database>({ dialect: new PostgresDialect({ pool }) }),
    dialect: "postgres",
    target: maskDatabaseUrl(url),
  };
}

function createSqlite(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    // Ensure data directory exists
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  if (path !== ":memory:") {
    database.pragma("journal_mode = WAL");
  }

  return {
    db: new Kysely<Database>({ dialect: new SqliteDialect({ database }) }),
    dialect: "sqlite",
    target: path,
  };
}

/**
 * Open the configured database: PostgreSQL when a URL is set, SQLite otherwise
 */
export function createDatabase(config: AppConfig["database"]): DatabaseHandle {
  const handle =
    config.url !== null ? createPostgres(config.url) : createSqlite(config.path);
  dbLogger.debug(
    { dialect: handle.dialect, target: handle.target },
    "Database handle created"
  );
  return handle;
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the database connection
 */
export async function closeConnection(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Mask the password of a connection URL for display
 */
export function maskDatabaseUrl(databaseUrl: string): string {
  const url = new URL(databaseUrl);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}
