import { Request, Response, NextFunction } from "express";
import { timingSafeEqual } from "crypto";
import { authenticateApiKey } from "../services/apiKeys.js";
import { getServiceToken } from "../config/app.js";
import { logger } from "./logging.js";

/**
 * Extend Express Request to include the API-key owner.
 */
declare global {
  namespace Express {
    interface Request {
      apiUser?: {
        id: string;
        platformUserId: string;
        chatId: string;
        isMuted: boolean;
        lastActive: Date;
      };
    }
  }
}

/**
 * Clients send the key as `Authorization: Bearer <key>`; `X-API-Key` is
 * accepted too for tools that cannot set Authorization.
 */
function extractApiKey(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    const key = authHeader.slice(7).trim();
    return key || null;
  }
  const headerKey = req.header("x-api-key")?.trim();
  return headerKey || null;
}

/**
 * Authenticate via API key. Unknown keys and deactivated users are both 401.
 */
export async function authenticate(req: Request, res: Response, next: NextFunction) {
  const apiKey = extractApiKey(req);
  if (!apiKey) {
    res.status(401).json({
      success: false,
      error: { code: "AUTHENTICATION_REQUIRED", message: "API key required" },
    });
    return;
  }

  try {
    const user = await authenticateApiKey(apiKey);
    if (!user) {
      logger.warn("API key rejected", { requestId: req.requestId });
      res.setHeader("WWW-Authenticate", "Bearer");
      res.status(401).json({
        success: false,
        error: { code: "INVALID_API_KEY", message: "Invalid API key" },
      });
      return;
    }

    req.apiUser = {
      id: user.id,
      platformUserId: user.platformUserId,
      chatId: user.chatId,
      isMuted: user.isMuted,
      lastActive: user.lastActive,
    };
    return next();
  } catch (error) {
    return next(error);
  }
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bot-to-backend calls (register, revoke, status, mute) carry the shared
 * service token instead of a user key.
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
