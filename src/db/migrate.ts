import { fileURLToPath } from "node:url";

import { sql, type CreateTableBuilder, type Kysely } from "kysely";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";
import { closeConnection, createDatabase } from "./connection.js";

import type { Database, SqlDialectName } from "./types.js";

// ============================================================================
// Schema
// ============================================================================

async function createEntityTables(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable("organizations")
    .ifNotExists()
    .addColumn("code", "text", (col) => col.primaryKey())
    .addColumn("name", "text")
    .addColumn("region", "text")
    .addColumn("full_name", "text")
    .addColumn("email", "text")
    .addColumn("phone", "text")
    .addColumn("legal_status", "text")
    .addColumn("website", "text")
    .addColumn("has_shower", "integer")
    .addColumn("venue_name", "text")
    .addColumn("venue_address", "text")
    .addColumn("venue_phone", "text")
    .addColumn("venue_accessible", "integer")
    .addColumn("venue_remarks", "text")
    .addColumn("teams_men", "integer")
    .addColumn("teams_women", "integer")
    .addColumn("teams_youth", "integer")
    .addColumn("teams_veterans", "integer")
    .addColumn("label", "text")
    .addColumn("palette", "text")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("players")
    .ifNotExists()
    .addColumn("licence", "text", (col) => col.primaryKey())
    .addColumn("name", "text")
    .addColumn("rank", "text")
    .addColumn("organization_code", "text")
    .addColumn("category", "text")
    .addColumn("points_start", "real")
    .addColumn("points_current", "real")
    .addColumn("ranking_position", "integer")
    .addColumn("total_wins", "integer")
    .addColumn("total_losses", "integer")
    .addColumn("women_rank", "text")
    .addColumn("women_points_start", "real")
    .addColumn("women_points_current", "real")
    .addColumn("women_total_wins", "integer")
    .addColumn("women_total_losses", "integer")
    .addColumn("last_update", "text")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_players_organization")
    .ifNotExists()
    .on("players")
    .column("organization_code")
    .execute();

  await db.schema
    .createTable("matches")
    .ifNotExists()
    .addColumn("match_key", "text", (col) => col.primaryKey())
    .addColumn("player_licence", "text", (col) => col.notNull())
    .addColumn("bracket", "text", (col) => col.notNull())
    .addColumn("match_date", "text", (col) => col.notNull())
    .addColumn("division", "text")
    .addColumn("opponent_club", "text")
    .addColumn("opponent_name", "text")
    .addColumn("opponent_licence", "text")
    .addColumn("opponent_rank", "text")
    .addColumn("opponent_points", "real")
    .addColumn("score", "text")
    .addColumn("won", "integer")
    .addColumn("points_delta", "real")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_matches_player")
    .ifNotExists()
    .on("matches")
    .columns(["player_licence", "match_date"])
    .execute();

  await db.schema
    .createTable("opponent_stats")
    .ifNotExists()
    .addColumn("player_licence", "text", (col) => col.notNull())
    .addColumn("bracket", "text", (col) => col.notNull())
    .addColumn("bucket", "text", (col) => col.notNull())
    .addColumn("wins", "integer", (col) => col.notNull())
    .addColumn("losses", "integer", (col) => col.notNull())
    .addColumn("ratio", "real")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("opponent_stats_pk", [
      "player_licence",
      "bracket",
      "bucket",
    ])
    .execute();

  await db.schema
    .createTable("competitions")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("name", "text")
    .addColumn("level", "text")
    .addColumn("date_start", "text")
    .addColumn("date_end", "text")
    .addColumn("reference", "text")
    .addColumn("series_count", "integer")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("competition_series")
    .ifNotExists()
    .addColumn("competition_id", "text", (col) => col.notNull())
    .addColumn("series_name", "text", (col) => col.notNull())
    .addColumn("series_date", "text")
    .addColumn("start_time", "text")
    .addColumn("entries_count", "integer")
    .addColumn("entries_max", "integer")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("competition_series_pk", [
      "competition_id",
      "series_name",
    ])
    .execute();

  await db.schema
    .createTable("registrations")
    .ifNotExists()
    .addColumn("competition_id", "text", (col) => col.notNull())
    .addColumn("series_name", "text", (col) => col.notNull())
    .addColumn("licence", "text", (col) => col.notNull())
    .addColumn("player_name", "text")
    .addColumn("organization_name", "text")
    .addColumn("rank", "text")
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("registrations_pk", [
      "competition_id",
      "series_name",
      "licence",
    ])
    .execute();
}

function withIdColumn<TB extends string>(
  builder: CreateTableBuilder<TB>,
  dialect: SqlDialectName
): CreateTableBuilder<TB, "id"> {
  return dialect === "postgres"
    ? builder.addColumn("id", "serial", (col) => col.primaryKey())
    : builder.addColumn("id", "integer", (col) =>
        col.primaryKey().autoIncrement()
      );
}

async function createLedgerTables(
  db: Kysely<Database>,
  dialect: SqlDialectName
): Promise<void> {
  await withIdColumn(
    db.schema.createTable("scrape_tasks").ifNotExists(),
    dialect
  )
    .addColumn("kind", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("trigger", "text", (col) => col.notNull())
    .addColumn("started_at", "text", (col) => col.notNull())
    .addColumn("finished_at", "text")
    .addColumn("total_units", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("completed_units", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("current_unit", "text")
    .addColumn("counters", "text", (col) => col.notNull().defaultTo("{}"))
    .addColumn("errors", "text", (col) => col.notNull().defaultTo("[]"))
    .execute();

  await db.schema
    .createIndex("idx_scrape_tasks_status")
    .ifNotExists()
    .on("scrape_tasks")
    .column("status")
    .execute();

  await withIdColumn(
    db.schema.createTable("task_logs").ifNotExists(),
    dialect
  )
    .addColumn("task_id", "integer", (col) =>
      col.notNull().references("scrape_tasks.id").onDelete("cascade")
    )
    .addColumn("seq", "integer", (col) => col.notNull())
    .addColumn("logged_at", "text", (col) => col.notNull())
    .addColumn("message", "text", (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex("idx_task_logs_task")
    .ifNotExists()
    .on("task_logs")
    .columns(["task_id", "seq"])
    .execute();
}

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create every table and index that does not exist yet
 */
export async function migrate(
  db: Kysely<Database>,
  dialect: SqlDialectName
): Promise<void> {
  dbLogger.info({ dialect }, "Running schema migration...");
  await createEntityTables(db);
  await createLedgerTables(db, dialect);
  dbLogger.info("Schema migration completed successfully");
}

export interface TableStats {
  table_name: string;
  row_count: number;
}

const COUNTED_TABLES = [
  "organizations",
  "players",
  "matches",
  "opponent_stats",
  "competitions",
  "competition_series",
  "registrations",
  "scrape_tasks",
] as const;

/**
 * Row counts for the main tables
 */
export async function getTableStats(
  db: Kysely<Database>
): Promise<TableStats[]> {
  const stats: TableStats[] = [];
  for (const table of COUNTED_TABLES) {
    const row = await db
      .selectFrom(table)
      .select(sql<number>`cast(count(*) as integer)`.as("count"))
      .executeTakeFirstOrThrow();
    stats.push({ table_name: table, row_count: Number(row.count) });
  }
  return stats;
}

// Run directly: tsx src/db/migrate.ts
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  const { db, dialect } = createDatabase(loadConfig().database);
  try {
    await migrate(db, dialect);
  } finally {
    await closeConnection(db);
  }
}
