/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { checkConnection } from "../../db/connection.js";
import { registerLicenseRoutes } from "./licenses.js";
import { registerOrganizationRoutes } from "./organizations.js";
import { registerSyncRoutes } from "./sync.js";

import type { Database } from "../../db/types.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
    database: Type.Union([Type.Literal("up"), Type.Literal("down")]),
  },
  {
    examples: [{ status: "ok", database: "up" }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  db: Kysely<Database>
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description:
          "Returns the health status of the API and whether the database answers",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => ({
      status: "ok" as const,
      database: (await checkConnection(db)) ? ("up" as const) : ("down" as const),
    })
  );

  // API v1 routes
  await app.register(
    (api) => {
      registerSyncRoutes(api, db);
      registerLicenseRoutes(api, db);
      registerOrganizationRoutes(api, db);
    },
    { prefix: "/api/v1" }
  );
}
