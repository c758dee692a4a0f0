import express from "express";
import cors from "cors";
import { APP_NAME, APP_VERSION, config } from "./config/app.js";
import { requestLogger, logger } from "./middleware/index.js";
import { healthRoutes } from "./routes/health.js";
import { keyRoutes } from "./routes/keys.js";
import { userRoutes } from "./routes/users.js";
import { notifyRoutes } from "./routes/notify.js";
import { processRoutes } from "./routes/process.js";
import { ServiceError, toErrorResponse } from "./services/errors.js";

/**
 * Build the Express application. index.ts adds the listener and the
 * delivery worker; tests drive the returned app through supertest.
 */
export function createApp(): express.Express {
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", 1);

  app.use(cors({
    origin: config.nodeEnv === "production" ? config.allowedOrigins : true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Authorization", "Content-Type", "X-API-Key", "X-Service-Token", "X-Request-Id"],
    maxAge: 86400,
  }));
  app.use(express.json({ limit: "1mb" }));

  // Request logging (adds requestId to each request)
  app.use(requestLogger);

  app.get("/", (_req, res) => {
    res.json({
      success: true,
      message: `${APP_NAME} API is running`,
      data: { version: APP_VERSION },
    });
  });

  // Health check routes (no auth required)
  app.use("/health", healthRoutes);

  // API routes
  app.use("/api/users", userRoutes);
  app.use("/api/process", processRoutes);
  app.use("/api", keyRoutes);
  app.use("/api", notifyRoutes);

  // Global error handler
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof ServiceError) {
        res.status(err.status).json(toErrorResponse(err));
        return;
      }

      // express.json() rejects malformed bodies with a 4xx status on the error
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
          message: config.nodeEnv === "production"
            ? "An unexpected error occurred"
            : err.message,
        },
      });
    }
  );

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: "NOT_FOUND",
        message: `Route ${req.method} ${req.path} not found`,
      },
    });
  });

  return app;
}
