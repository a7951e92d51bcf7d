import { Kysely, PostgresDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";
import { createSqliteDb } from "./sqlite.js";

import type { AppConfig } from "../config.js";
import type { Database } from "./types.js";

const { Pool, types } = pg;

export type DatabaseConfig = AppConfig["database"];

// ============================================================================
// Type Parsers
// ============================================================================

/**
 * "2024-03-10 23:45:00.123+00" -> "2024-03-10T23:45:00.123Z"
 */
export function pgTimestampToIso(value: string): string {
  const normalized = value
    .replace(" ", "T")
    .replace(/([+-]\d{2})$/, "$1:00");
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

// Row types carry timestamps and dates as strings on both drivers
types.setTypeParser(types.builtins.TIMESTAMPTZ, pgTimestampToIso);
types.setTypeParser(types.builtins.DATE, (val: string) => val);
// COUNT(*) comes back as bigint
types.setTypeParser(types.builtins.INT8, (val: string) => Number(val));

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

function createPostgresDb(url: string): Kysely<Database> {
  const pool = new Pool({
    connectionString: url,
    max: 10, // Maximum pool connections
    idleTimeoutMillis: 30_000, // Close idle connections after 30s
    connectionTimeoutMillis: 5000, // Connection timeout
  });

  pool.on("error", (error) => {
    dbLogger.error({ error }, "Idle PostgreSQL client error");
  });

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
}

/**
 * Open the configured database. The caller owns the instance and closes it
 * with closeConnection().
 */
export function createDatabase(config: DatabaseConfig): Kysely<Database> {
  if (config.driver === "sqlite") {
    return createSqliteDb(config.path);
  }
  return createPostgresDb(config.url);
}

// ============================================================================
// Connection Management
// ============================================================================

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Close the database connection
 */
export async function closeConnection(db: Kysely<Database>): Promise<void> {
  try {
    // db.destroy() closes the underlying pool / sqlite handle
    await db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Describe the configured database for display, with any password masked
 */
export function getDatabaseUrl(config: DatabaseConfig): string {
  if (config.driver === "sqlite") {
    return `sqlite:${config.path}`;
  }
  try {
    const url = new URL(config.url);
    if (url.password !== "") {
      url.password = "****";
    }
    return url.toString();
  } catch {
    return "postgresql://<invalid url>";
  }
}
