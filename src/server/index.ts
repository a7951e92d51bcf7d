import { loadConfig } from "../config.js";
import {
  closeConnection,
  createDatabase,
  getDatabaseUrl,
} from "../db/connection.js";
import { serverLogger } from "../logger.js";
import { buildServer } from "./app.js";

const config = loadConfig();
serverLogger.info(
  { database: getDatabaseUrl(config.database) },
  "Starting API server"
);
const db = createDatabase(config.database);
const app = await buildServer({ db });

app.addHook("onClose", async () => {
  await closeConnection(db);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    void app.close();
  });
}

// Start server
const { host, port } = config.server;
try {
  await app.listen({ port, host });
  app.log.info({ host, port }, "Server started");
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
