import { loadConfig, type AppConfig } from "../../config.js";
import { closeConnection, createDatabase } from "../../db/connection.js";
import { ConfigError, errorMessage } from "../../errors.js";
import { printError } from "./display.js";

import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

export interface CommandContext {
  config: AppConfig;
  db: Kysely<Database>;
}

/**
 * Load configuration, open the database, run `fn`, and always close the
 * connection afterwards. Failures set a non-zero exit code.
 */
export async function withContext(
  fn: (ctx: CommandContext) => Promise<void>
): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    printError(errorMessage(error));
    if (error instanceof ConfigError) {
      for (const detail of error.details) {
        console.error(`  ${detail}`);
      }
    }
    process.exitCode = 1;
    return;
  }

  const db = createDatabase(config.database);
  try {
    await fn({ config, db });
  } finally {
    await closeConnection(db);
  }
}
