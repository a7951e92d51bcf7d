/**
 * Environment configuration
 *
 * Every tunable has a default so `sync once` works against a local database
 * with nothing but the upstream credentials set.
 */

import "dotenv/config";

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { ConfigError } from "./errors.js";

// ============================================================================
// Schema
// ============================================================================

const EnvSchema = Type.Object({
  DB_DRIVER: Type.Union([Type.Literal("postgres"), Type.Literal("sqlite")], {
    default: "postgres",
  }),
  DATABASE_URL: Type.String({
    default: "postgresql://localhost:5432/license_sync",
  }),
  SQLITE_PATH: Type.String({ default: "./data/license-sync.db" }),

  ARTIFACT_PATH: Type.String({
    minLength: 1,
    default: "./data/licenses-export.json",
  }),
  SYNC_INTERVAL_MINUTES: Type.Integer({ minimum: 1, default: 30 }),
  SETTLE_DELAY_MS: Type.Integer({ minimum: 0, default: 10_000 }),
  INITIAL_POLL_MS: Type.Integer({ minimum: 1, default: 60_000 }),
  STEADY_POLL_MS: Type.Integer({ minimum: 1, default: 120_000 }),

  MARKETPLACE_BASE_URL: Type.String({
    default: "https://marketplace.atlassian.com",
  }),
  MARKETPLACE_VENDOR_ID: Type.String({ default: "" }),
  MARKETPLACE_USER: Type.String({ default: "" }),
  MARKETPLACE_PASSWORD: Type.String({ default: "" }),

  ORG_API_BASE_URL: Type.String({
    default: "https://api.crunchbase.com/v3.1",
  }),
  ORG_API_KEY: Type.String({ default: "" }),
  ORG_API_RATE_LIMIT_MS: Type.Integer({ minimum: 0, default: 2_500 }),

  PORT: Type.Integer({ minimum: 1, maximum: 65_535, default: 3000 }),
  HOST: Type.String({ default: "0.0.0.0" }),
});

type Env = Static<typeof EnvSchema>;

// ============================================================================
// Types
// ============================================================================

export interface AppConfig {
  database:
    | { driver: "postgres"; url: string }
    | { driver: "sqlite"; path: string };
  sync: {
    artifactPath: string;
    intervalMinutes: number;
    settleDelayMs: number;
    initialPollMs: number;
    steadyPollMs: number;
  };
  marketplace: {
    baseUrl: string;
    vendorId: string;
    user: string;
    password: string;
  };
  orgApi: {
    baseUrl: string;
    apiKey: string;
    rateLimitMs: number;
  };
  server: {
    port: number;
    host: string;
  };
}

// ============================================================================
// Loading
// ============================================================================

function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") {
      picked[key] = value;
    }
  }
  return picked;
}

function parseEnv(env: NodeJS.ProcessEnv): Env {
  const value = Value.Convert(
    EnvSchema,
    Value.Default(EnvSchema, pickEnv(env))
  );

  if (!Value.Check(EnvSchema, value)) {
    const details = [...Value.Errors(EnvSchema, value)].map(
      (e) => `${e.path.slice(1)}: ${e.message}`
    );
    throw new ConfigError("Invalid environment configuration", details);
  }

  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = parseEnv(env);

  return {
    database:
      e.DB_DRIVER === "sqlite"
        ? { driver: "sqlite", path: e.SQLITE_PATH }
        : { driver: "postgres", url: e.DATABASE_URL },
    sync: {
      artifactPath: e.ARTIFACT_PATH,
      intervalMinutes: e.SYNC_INTERVAL_MINUTES,
      settleDelayMs: e.SETTLE_DELAY_MS,
      initialPollMs: e.INITIAL_POLL_MS,
      steadyPollMs: e.STEADY_POLL_MS,
    },
    marketplace: {
      baseUrl: e.MARKETPLACE_BASE_URL.replace(/\/+$/, ""),
      vendorId: e.MARKETPLACE_VENDOR_ID,
      user: e.MARKETPLACE_USER,
      password: e.MARKETPLACE_PASSWORD,
    },
    orgApi: {
      baseUrl: e.ORG_API_BASE_URL.replace(/\/+$/, ""),
      apiKey: e.ORG_API_KEY,
      rateLimitMs: e.ORG_API_RATE_LIMIT_MS,
    },
    server: {
      port: e.PORT,
      host: e.HOST,
    },
  };
}

/**
 * Names of required upstream settings that are still empty.
 */
export function missingUpstreamSettings(config: AppConfig): string[] {
  const missing: string[] = [];
  if (config.marketplace.vendorId === "") missing.push("MARKETPLACE_VENDOR_ID");
  if (config.marketplace.user === "") missing.push("MARKETPLACE_USER");
  if (config.marketplace.password === "") missing.push("MARKETPLACE_PASSWORD");
  if (config.orgApi.apiKey === "") missing.push("ORG_API_KEY");
  return missing;
}
