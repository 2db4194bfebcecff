/**
 * Service wiring shared by the HTTP server and the CLI
 */

import { createDatabase, type DatabaseHandle } from "../db/connection.js";
import { UpstreamClient } from "../scraper/client.js";
import { buildEndpointCatalog } from "../scraper/endpoints.js";
import { ReconciliationStore } from "./store/reconciliation.js";
import { TaskLedger } from "./tasks/ledger.js";
import { TaskOrchestrator } from "./tasks/orchestrator.js";

import type { AppConfig } from "../config.js";

export interface Services {
  database: DatabaseHandle;
  store: ReconciliationStore;
  ledger: TaskLedger;
  client: UpstreamClient;
  orchestrator: TaskOrchestrator;
}

export function createServices(config: AppConfig): Services {
  const database = createDatabase(config.database);
  const store = new ReconciliationStore(database.db);
  const ledger = new TaskLedger(database.db);
  const client = new UpstreamClient({
    endpoints: buildEndpointCatalog(config.upstream),
    retry: config.upstream.retry,
    timeoutMs: config.upstream.timeoutMs,
    userAgent: config.upstream.userAgent,
  });
  const orchestrator = new TaskOrchestrator({
    store,
    ledger,
    client,
    settings: config.scrape,
  });

  return { database, store, ledger, client, orchestrator };
}

export { ReconciliationStore, StoreUnavailableError } from "./store/reconciliation.js";
export { TaskLedger } from "./tasks/ledger.js";
export { TaskOrchestrator } from "./tasks/orchestrator.js";
export { TaskConflictError } from "./tasks/registry.js";
export { ScrapeScheduler } from "./tasks/scheduler.js";
