// Load environment variables FIRST, before any other imports
import "./config/load_env.js";

import http from "http";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { connectToDatabase, disconnectFromDatabase } from "./db/connection.js";
import { createServices } from "./services/container.js";
import { SocketDocumentEvents, initializeWebSocket } from "./utils/socket_server.js";
import logger from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  await connectToDatabase(config.mongo);

  const server = http.createServer();
  const io = initializeWebSocket(server, config);
  const services = createServices(config, logger, new SocketDocumentEvents(io));
  server.on("request", createApp(services, config));

  server.listen(config.server.port, () =>
    logger.info(`Server running on http://localhost:${config.server.port}`)
  );

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal, pending: services.processor.pending }, "Shutting down");

    await services.processor.idle();
    await new Promise<void>((resolve) => {
      void io.close(() => resolve());
    });
    await disconnectFromDatabase();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  logger.error({ err }, "Failed to start the server");
  process.exit(1);
});
