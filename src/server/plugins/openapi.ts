/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Table Tennis Catalog API",
        description:
          "REST API over a local copy of the federation's club directory, player sheets and tournament calendar. " +
          "Scrape tasks refresh the copy in the background; read endpoints serve what has been merged so far.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      tags: [
        {
          name: "Scrape",
          description: "Start, follow and cancel background scrape tasks",
        },
        {
          name: "Clubs",
          description: "Clubs, their regions and their members",
        },
        {
          name: "Players",
          description:
            "Player sheets, match history, opponent statistics and head-to-head records",
        },
        {
          name: "Competitions",
          description: "Tournament calendar with series and registrations",
        },
        {
          name: "Stats",
          description: "Catalog counters",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
