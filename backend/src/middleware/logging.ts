import { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";

// Extend Express Request to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
      startTime: number;
    }
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogMeta {
  requestId?: string;
  userId?: string;
  method?: string;
  path?: string;
  statusCode?: number;
  durationMs?: number;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = ["password", "token", "secret", "authorization", "apikey", "api_key"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

/**
 * Structured logger that writes one JSON object per line to the console.
 */
class Logger {
  constructor(private readonly service: string) {}

  private minLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL;
    return isLogLevel(configured) ? configured : "info";
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel()];
  }

  private format(level: LogLevel, message: string, meta: LogMeta): string {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...meta,
    };

    for (const key of Object.keys(entry)) {
      if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
        entry[key] = "[REDACTED]";
      }
    }

    return JSON.stringify(entry);
  }

  private log(level: LogLevel, message: string, meta: LogMeta = {}) {
    if (!this.shouldLog(level)) return;

    const output = this.format(level, message, meta);
    if (level === "error") {
      console.error(output);
    } else if (level === "warn") {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, meta?: LogMeta) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.log("warn", message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta) {
    this.log("error", message, {
      ...meta,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: process.env.NODE_ENV !== "production" ? error.stack : undefined,
          }
        : undefined,
    });
  }
}

export const logger = new Logger("backend");

/**
 * Request logging middleware.
 * Adds requestId to each request and logs request/response timing.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const incoming = req.headers["x-request-id"];
  req.requestId = typeof incoming === "string" && incoming ? incoming : randomUUID();
  req.startTime = Date.now();

  res.setHeader("x-request-id", req.requestId);

  // Skip health checks to reduce noise
  if (!req.path.startsWith("/health")) {
    logger.info("Request received", {
      requestId: req.requestId,
      method: req.method,
      path: req.path,
    });
  }

  res.on("finish", () => {
    if (req.path.startsWith("/health") && res.statusCode < 400) {
      return;
    }

    const logMeta: LogMeta = {
      requestId: req.requestId,
      userId: req.apiUser?.id,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - req.startTime,
    };

    if (res.statusCode >= 500) {
      logger.error("Request failed", undefined, logMeta);
    } else if (res.statusCode >= 400) {
      logger.warn("Request completed with error", logMeta);
    } else {
      logger.info("Request completed", logMeta);
    }
  });

  next();
}
