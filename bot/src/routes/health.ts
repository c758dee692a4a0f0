import { Router } from "express";

/**
 * `ready` reports whether the Telegram side has come up; the bot holds no
 * database of its own.
 */
export function createHealthRoutes(isReady: () => boolean) {
  const router = Router();

  /** Liveness probe: is the process alive? */
  router.get("/live", (_req, res) => {
    res.json({ status: "ok", service: "bot" });
  });

  /** Readiness probe: is the bot polling Telegram? */
  router.get("/ready", (_req, res) => {
    const ready = isReady();
    res.status(ready ? 200 : 503).json({
      status: ready ? "ok" : "degraded",
      service: "bot",
      checks: { telegram: ready ? "ok" : "starting" },
    });
  });

  return router;
}
