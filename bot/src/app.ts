import express from "express";
import { requestLogger, logger } from "./middleware/logging.js";
import { createDeliverRoutes } from "./routes/deliver.js";
import { createHealthRoutes } from "./routes/health.js";
import { config } from "./config.js";
import type { MessageSender } from "./services/telegram.js";

export interface BotAppOptions {
  send: MessageSender;
  isReady: () => boolean;
}

/**
 * HTTP side of the bot: the backend-facing /deliver receiver plus probes.
 */
export function createApp(options: BotAppOptions): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  app.use(express.json({ limit: "1mb" }));
  app.use(requestLogger);

  // Health (no auth)
  app.use("/health", createHealthRoutes(options.isReady));

  app.use("/deliver", createDeliverRoutes(options.send));

  // Global error handler
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      const status = "status" in err && typeof err.status === "number" ? err.status : 500;
      if (status >= 400 && status < 500) {
        res.status(status).json({
          success: false,
          error: { code: "VALIDATION_ERROR", message: err.message },
        });
        return;
      }

      logger.error("Unhandled error", err, {
        requestId: req.requestId,
        method: req.method,
        path: req.path,
      });

      res.status(500).json({
        success: false,
        error: {
          code: "INTERNAL_ERROR",
          message: config.nodeEnv === "production" ? "An unexpected error occurred" : err.message,
        },
      });
    },
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: { code: "NOT_FOUND", message: `Route ${req.method} ${req.path} not found` },
    });
  });

  return app;
}
