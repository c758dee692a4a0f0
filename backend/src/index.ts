import { config } from "./config/app.js";
import { createApp } from "./app.js";
import { logger } from "./middleware/index.js";
import { closeDb, getClient } from "./db/index.js";
import { initializeSchema } from "./db/init.js";
import { DeliveryWorker } from "./services/deliveryWorker.js";

await initializeSchema(getClient());

const app = createApp();
const worker = new DeliveryWorker();
worker.start();

const server = app.listen(config.port, () => {
  logger.info("Server started", {
    port: config.port,
    env: config.nodeEnv,
  });
});

// Graceful shutdown
let shuttingDown = false;
function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down gracefully`);

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error("Forced shutdown due to timeout");
    process.exit(1);
  }, 30000).unref();

  server.close(() => {
    logger.info("HTTP server closed");
    worker
      .stop()
      .then(() => {
        closeDb();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error("Delivery worker failed to stop", error instanceof Error ? error : undefined);
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
