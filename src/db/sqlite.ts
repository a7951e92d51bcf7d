import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import type { Database } from "./types.js";

/**
 * SQLite-backed database, used for local runs and by the test suite.
 * Pass ":memory:" for a throwaway in-process database.
 */
export function createSqliteDb(path: string): Kysely<Database> {
  if (path !== ":memory:") {
    // Ensure data directory exists
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  // Cascades and the licenses -> addons composite key rely on this
  database.pragma("foreign_keys = ON");

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}
