#!/usr/bin/env node

/**
 * Table-tennis catalog sync CLI
 *
 * Scrapes the federation's club directory, player sheets and tournament
 * calendar into the local catalog and inspects past scrape tasks.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerScrapeCommand } from "./commands/scrape.js";
import { registerTasksCommand } from "./commands/tasks.js";

const program = new Command();

program
  .name("tt-sync")
  .description("Table-tennis federation catalog sync CLI")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerScrapeCommand(program);
registerTasksCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
