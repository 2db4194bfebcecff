/**
 * Fastify application assembly, shared by the server entry point and tests
 */

import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes, type ApiDeps } from "./routes/index.js";

export interface BuildAppOptions extends ApiDeps {
  logger?: FastifyServerOptions["logger"];
  corsOrigins?: string[] | true;
}

export async function buildApp(
  options: BuildAppOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  // Register plugins
  await app.register(cors, {
    origin: options.corsOrigins ?? true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, options);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
