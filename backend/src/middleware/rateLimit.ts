import { Request, Response, NextFunction } from "express";
import { logger } from "./logging.js";

interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (req: Request) => string;
  message?: string;
}

/**
 * In-memory rate limit store (single process, like the delivery queue).
 */
interface RateLimitEntry {
  count: number;
  resetAt: number;
}

const rateLimitStore = new Map<string, RateLimitEntry>();

// Clean up expired entries periodically; unref so the timer never keeps the process alive
setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of rateLimitStore.entries()) {
    if (entry.resetAt < now) {
      rateLimitStore.delete(key);
    }
  }
}, 60_000).unref();

/**
 * Default key generator - uses the API-key owner or IP
 */
function defaultKeyGenerator(req: Request): string {
  const userId = req.apiUser?.id;
  if (userId) {
    return `user:${userId}`;
  }
  const ip = req.ip || req.socket.remoteAddress || "unknown";
  return `ip:${ip}`;
}

/**
 * Create rate limiting middleware
 */
export function rateLimit(config: RateLimitConfig) {
  const {
    windowMs,
    maxRequests,
    keyGenerator = defaultKeyGenerator,
    message = "Too many requests, please try again later",
  } = config;

  return (req: Request, res: Response, next: NextFunction) => {
    const key = keyGenerator(req);
    const now = Date.now();

    let entry = rateLimitStore.get(key);
    if (!entry || entry.resetAt < now) {
      entry = { count: 0, resetAt: now + windowMs };
      rateLimitStore.set(key, entry);
    }

    entry.count++;

    const remaining = Math.max(0, maxRequests - entry.count);
    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(entry.resetAt / 1000));

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      res.setHeader("Retry-After", retryAfter);

      logger.warn("Rate limit exceeded", {
        requestId: req.requestId,
        key,
        count: entry.count,
        limit: maxRequests,
      });

      res.status(429).json({
        success: false,
        error: { code: "RATE_LIMIT_EXCEEDED", message, retryAfter },
      });
      return;
    }

    next();
  };
}

// Client SDK traffic: 120 requests per minute per API key
export const standardRateLimit = rateLimit({
  windowMs: 60 * 1000,
  maxRequests: 120,
  message: "Too many requests. Please slow down.",
});

// Bot-to-backend key management: 30 requests per minute per IP
export const serviceRateLimit = rateLimit({
  windowMs: 60 * 1000,
  maxRequests: 30,
  keyGenerator: (req) => `service:${req.ip || req.socket.remoteAddress || "unknown"}`,
  message: "Too many key management requests.",
});

/**
 * Clear rate limit store (for testing)
 */
export function clearRateLimitStore() {
  rateLimitStore.clear();
}
