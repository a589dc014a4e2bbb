// Load environment variables first before any other imports
import dotenv from "dotenv";
dotenv.config();

import { createApp } from "./app";
import { config } from "./config/unified-config";
import { logger } from "./config/logger";

const app = createApp();

// Export app for testing purposes
export default app;

function startServer(): void {
  const port = config.port;

  const server = app.listen(port, "0.0.0.0", () => {
    logger.info({ port, environment: config.env }, "Server started successfully");
  });

  const gracefulShutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received, closing HTTP server");
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, "Error during graceful shutdown");
        process.exit(1);
      }
      logger.info("Graceful shutdown completed");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));

  process.on("uncaughtException", (error) => {
    logger.fatal({ err: error }, "Uncaught exception");
    process.exit(1);
  });
}

if (require.main === module) {
  startServer();
}
