import type { Server } from "http";
import { CONNECTION_TIMEOUT_MS, DATABASE_PATH, HOST, MAX_CONNECTIONS, PORT, READ_ONLY } from "./config";
import { ConnectionManager } from "./database/connection";
import { DatabaseConnectionError } from "./errors";
import { buildServices, createApp } from "./server";
import { errorMessage, logger } from "./utils/logger";
import { withTimeout } from "./utils/timeout";

async function start(): Promise<void> {
  logger.info("server_starting", { database: DATABASE_PATH, readOnly: READ_ONLY });

  const connections = await withTimeout(
    ConnectionManager.open({ path: DATABASE_PATH, readOnly: READ_ONLY, maxConnections: MAX_CONNECTIONS }),
    CONNECTION_TIMEOUT_MS,
    () => new DatabaseConnectionError(`Opening ${DATABASE_PATH} took longer than ${CONNECTION_TIMEOUT_MS}ms`)
  );
  if (await connections.testConnection()) logger.info("database_ready");
  else logger.error("database_unreachable");

  const services = buildServices(connections);
  await services.catalog.primeCache();
  await services.routes.generateAll(services.catalog);

  const app = createApp(services);
  const server: Server = app.listen(PORT, HOST, () => {
    logger.info("server_listening", { host: HOST, port: PORT });
  });

  const shutdown = (signal: string) => {
    logger.info("server_stopping", { signal });
    server.close(() => {
      connections
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("shutdown_failed", { error: errorMessage(err) });
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err: unknown) => {
  logger.error("server_start_failed", { error: errorMessage(err) });
  process.exit(1);
});
