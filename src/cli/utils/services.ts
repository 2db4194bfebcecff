/**
 * Opens the configured services for one CLI command and closes them after
 */

import { loadConfig, type AppConfig } from "../../config.js";
import { closeConnection } from "../../db/connection.js";
import { createServices, type Services } from "../../services/index.js";

export async function withServices<T>(
  run: (services: Services, config: AppConfig) => Promise<T>
): Promise<T> {
  const config = loadConfig();
  const services = createServices(config);
  try {
    return await run(services, config);
  } finally {
    await closeConnection(services.database.db);
  }
}
