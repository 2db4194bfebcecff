import ora from "ora";

import { checkConnection } from "../../db/connection.js";
import { getTableStats, migrate } from "../../db/migrate.js";
import { errorMessage } from "../../utils/errors.js";
import { displayTableStats } from "../utils/display.js";
import { withServices } from "../utils/services.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the catalog and task tables if they do not exist")
    .action(async () => {
      const spinner = ora("Running migration...").start();

      try {
        await withServices(async ({ database }) => {
          spinner.text = `Migrating ${database.target}...`;
          await migrate(database.db, database.dialect);
          spinner.succeed("Migration completed successfully");

          console.log("\nTables:");
          displayTableStats(await getTableStats(database.db));
        });
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        await withServices(async ({ database }) => {
          const connected = await checkConnection(database.db);
          if (!connected) {
            spinner.fail(`Database connection failed: ${database.target}`);
            process.exitCode = 1;
            return;
          }

          spinner.succeed(`Database connected (${database.dialect})`);
          console.log(`\nDatabase: ${database.target}\n`);
          displayTableStats(await getTableStats(database.db));
        });
      } catch (error) {
        spinner.fail(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
