import { Router } from "express";
import { sql } from "drizzle-orm";
import { db } from "../db/index.js";
import { APP_VERSION } from "../config/app.js";
import { deliveryQueue } from "../services/deliveryQueue.js";

export const healthRoutes = Router();

interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    database?: {
      status: "healthy" | "unhealthy";
      latencyMs?: number;
      error?: string;
    };
    deliveryQueue?: {
      depth: number;
      inFlight: number;
      closed: boolean;
    };
  };
}

const startTime = Date.now();

/**
 * Basic liveness check
 * Used by container orchestration to check if the process is running
 */
healthRoutes.get("/live", (_req, res) => {
  res.json({
    status: "healthy",
    timestamp: new Date().toISOString(),
  });
});

/**
 * Readiness check: database round trip plus delivery queue depth.
 */
healthRoutes.get("/ready", async (_req, res) => {
  const checks: HealthStatus["checks"] = {
    deliveryQueue: {
      depth: deliveryQueue.size,
      inFlight: deliveryQueue.pending,
      closed: deliveryQueue.isClosed,
    },
  };
  let status: HealthStatus["status"] = "healthy";

  try {
    const dbStart = Date.now();
    await db.run(sql`select 1`);
    checks.database = { status: "healthy", latencyMs: Date.now() - dbStart };
  } catch (error) {
    status = "unhealthy";
    checks.database = {
      status: "unhealthy",
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }

  const health: HealthStatus = {
    status,
    timestamp: new Date().toISOString(),
    version: APP_VERSION,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks,
  };

  res.status(status === "healthy" ? 200 : 503).json(health);
});
