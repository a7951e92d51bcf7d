import ora from "ora";

import { checkConnection, getDatabaseUrl } from "../../db/connection.js";
import {
  getMigrationStatus,
  getTableStats,
  runMigration,
} from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { withContext } from "../utils/context.js";
import { displayMigrationStatus, displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Apply pending schema migrations")
    .option("--fresh", "Roll back every migration first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      await withContext(async ({ db: conn }) => {
        const spinner = ora("Running migrations...").start();

        try {
          if (options.fresh === true) {
            spinner.text = "Rolling back existing schema...";
          }

          const applied = await runMigration(conn, { fresh: options.fresh });
          spinner.succeed(
            applied.length > 0
              ? `Applied ${String(applied.length)} migration(s): ${applied.join(", ")}`
              : "Schema already up to date"
          );

          console.log("\nTables:");
          displayTableStats(await getTableStats(conn));
        } catch (error) {
          spinner.fail(`Migration failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      });
    });

  // db status
  db.command("status")
    .description("Check database connection, migrations and row counts")
    .action(async () => {
      await withContext(async ({ config, db: conn }) => {
        const spinner = ora("Checking database connection...").start();

        try {
          const connected = await checkConnection(conn);

          if (!connected) {
            spinner.fail("Database connection failed");
            console.log(`\nDatabase: ${getDatabaseUrl(config.database)}`);
            process.exitCode = 1;
            return;
          }

          spinner.succeed("Database connected");
          console.log(`\nDatabase: ${getDatabaseUrl(config.database)}\n`);

          const migrations = await getMigrationStatus(conn);
          displayMigrationStatus(migrations);

          if (migrations.some((m) => m.executedAt === undefined)) {
            console.log("\nSchema: pending migrations (run 'db migrate')");
            return;
          }

          console.log("\nTable statistics:");
          displayTableStats(await getTableStats(conn));
        } catch (error) {
          spinner.fail(`Error: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      });
    });
}
