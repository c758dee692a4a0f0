import { Request, Response, NextFunction } from "express";
import { timingSafeEqual } from "crypto";
import { getServiceToken } from "../config.js";
import { logger } from "./logging.js";

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Only the backend's delivery worker may push messages through the bot.
 */
export function requireServiceToken(req: Request, res: Response, next: NextFunction) {
  const provided = req.header("x-service-token");
  if (!provided || !tokensMatch(provided, getServiceToken())) {
    logger.warn("Service token rejected", { requestId: req.requestId, path: req.path });
    res.status(401).json({
      success: false,
      error: { code: "INVALID_SERVICE_TOKEN", message: "Valid service token required" },
    });
    return;
  }
  next();
}
