import { createApp } from "./app.js";
import { env } from "./config/env.js";
import logger from "./config/logger.js";

const app = createApp();

const server = app.listen(env.PORT, () => {
  logger.info(`Server running on http://localhost:${env.PORT} [${env.NODE_ENV}]`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received. Shutting down gracefully...`);

  server.close((err) => {
    if (err) {
      logger.error("Error while closing server", { error: err.message });
      process.exit(1);
    }
    logger.info("Server closed.");
    process.exit(0);
  });

  // Force exit after 10s if connections don't close
  setTimeout(() => {
    logger.error("Forcing shutdown...");
    process.exit(1);
  }, 10_000).unref();
};

process.on("SIGTERM", () => shutdown("SIGTERM")); // Docker sends this
process.on("SIGINT", () => shutdown("SIGINT")); // Ctrl+C sends this
