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
        title: "License Sync API",
        description:
          "Read-only view of the license store: synchronization status, " +
          "synced licenses and the organizations linked to them.",
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
          name: "Health",
          description: "Liveness and database reachability",
        },
        {
          name: "Sync",
          description: "Watermark state and recent sync cycles",
        },
        {
          name: "Licenses",
          description: "Synced licenses with their addon, contacts and partner",
        },
        {
          name: "Organizations",
          description: "Organization profiles linked to licenses",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
