import { ConfigError, loadConfig, type AppConfig } from "../config.js";
import { closeConnection } from "../db/connection.js";
import { migrate } from "../db/migrate.js";
import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { createServices, ScrapeScheduler } from "../services/index.js";
import { buildApp } from "./app.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      serverLogger.fatal({ error: err.message }, "Invalid configuration");
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const services = createServices(config);
const { database, ledger, orchestrator } = services;

// Schema and leftovers from a previous process
await migrate(database.db, database.dialect);
await ledger.recoverInterrupted();

const app = await buildApp({
  store: services.store,
  orchestrator,
  logger: fastifyLoggerConfig,
  corsOrigins: config.server.corsOrigins,
});

const scheduler =
  config.schedule.intervalMinutes !== null
    ? new ScrapeScheduler(orchestrator, {
        intervalMinutes: config.schedule.intervalMinutes,
        kinds: config.schedule.kinds,
      })
    : null;

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  serverLogger.info({ signal }, "Shutting down");
  scheduler?.stop();
  await app.close();
  await closeConnection(database.db);
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      serverLogger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  });
}

// Start server
try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port, database: database.target },
    "Server started"
  );
  scheduler?.start();
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
