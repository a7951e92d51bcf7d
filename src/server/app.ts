import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { Database } from "../db/types.js";
import type { Kysely } from "kysely";

export interface BuildServerOptions {
  db: Kysely<Database>;
  /** Defaults to the shared pino configuration; tests pass false */
  logger?: typeof fastifyLoggerConfig | boolean;
}

export async function buildServer(
  options: BuildServerOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? fastifyLoggerConfig,
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, options.db);

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
