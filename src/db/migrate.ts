import {
  Migrator,
  NO_MIGRATIONS,
  sql,
  type Kysely,
  type Migration,
  type MigrationProvider,
} from "kysely";

import { loadConfig } from "../config.js";
import { dbLogger } from "../logger.js";
import { closeConnection, createDatabase } from "./connection.js";
import * as initialSchema from "./migrations/001-initial-schema.js";

import type { Database } from "./types.js";

// ============================================================================
// Migration Provider
// ============================================================================

/**
 * Migrations are bundled with the code instead of read from a folder, so the
 * compiled CLI and the test suite see exactly the same list.
 */
const MIGRATIONS: Record<string, Migration> = {
  "001-initial-schema": initialSchema,
};

class BundledMigrationProvider implements MigrationProvider {
  getMigrations(): Promise<Record<string, Migration>> {
    return Promise.resolve(MIGRATIONS);
  }
}

function createMigrator(db: Kysely<Database>): Migrator {
  return new Migrator({ db, provider: new BundledMigrationProvider() });
}

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Bring the schema up to date. With `fresh`, every migration is rolled back
 * first, dropping all synced data.
 */
export async function runMigration(
  db: Kysely<Database>,
  options?: { fresh?: boolean }
): Promise<string[]> {
  const migrator = createMigrator(db);

  if (options?.fresh === true) {
    dbLogger.info("Rolling back all migrations (--fresh mode)...");
    const { error } = await migrator.migrateTo(NO_MIGRATIONS);
    if (error !== undefined) {
      dbLogger.error({ error }, "Rollback failed");
      throw error;
    }
  }

  dbLogger.info("Running schema migrations...");
  const { error, results } = await migrator.migrateToLatest();

  const applied: string[] = [];
  for (const result of results ?? []) {
    if (result.status === "Success") {
      applied.push(result.migrationName);
      dbLogger.info({ migration: result.migrationName }, "Migration applied");
    } else if (result.status === "Error") {
      dbLogger.error({ migration: result.migrationName }, "Migration failed");
    }
  }

  if (error !== undefined) {
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  }

  dbLogger.info(
    { applied: applied.length },
    "Schema migration completed successfully"
  );
  return applied;
}

export interface MigrationState {
  name: string;
  executedAt: Date | undefined;
}

/**
 * List every known migration and when it ran
 */
export async function getMigrationStatus(
  db: Kysely<Database>
): Promise<MigrationState[]> {
  const migrations = await createMigrator(db).getMigrations();
  return migrations.map((m) => ({ name: m.name, executedAt: m.executedAt }));
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

const STAT_TABLES = [
  "contacts",
  "addons",
  "organizations",
  "partner_details",
  "license_contact_details",
  "licenses",
  "sync_watermarks",
  "sync_runs",
] as const;

/**
 * Row counts per table. Works on both drivers, unlike pg_stat_user_tables.
 */
export async function getTableStats(db: Kysely<Database>): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of STAT_TABLES) {
    const row = await db
      .selectFrom(table)
      .select(sql<number>`count(*)`.as("count"))
      .executeTakeFirst();
    stats.push({ table_name: table, row_count: Number(row?.count ?? 0) });
  }
  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const fresh = args.includes("--fresh");

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  const db = createDatabase(loadConfig().database);
  try {
    await runMigration(db, { fresh });
    console.log("Migration completed successfully!");

    // Show table stats
    const stats = await getTableStats(db);
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection(db);
  }
}

// Only run main() if this file is executed directly (not imported)
const isMainModule = process.argv[1]?.includes("migrate");
if (isMainModule === true) {
  void main();
}
