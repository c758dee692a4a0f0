/**
 * Integration tests for Rate Limiting
 *
 * Tests:
 * - Custom limiter window and limit
 * - Rate limit headers
 * - Per-key isolation
 * - Service limiter keys on IP
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import request from "supertest";
import express, { type Express } from "express";
import { randomUUID } from "crypto";
import { rateLimit, serviceRateLimit, clearRateLimitStore } from "../middleware/rateLimit.js";

// ============= Test Setup =============

function createTestApp(middleware: ReturnType<typeof rateLimit>, userId?: string): Express {
  const app = express();

  app.use((req, _res, next) => {
    req.requestId = randomUUID();
    if (userId) {
      req.apiUser = {
        id: userId,
        platformUserId: userId,
        chatId: userId,
        isMuted: false,
        lastActive: new Date(),
      };
    }
    next();
  });

  app.use(middleware);

  app.get("/test", (_req, res) => {
    res.json({ success: true });
  });

  return app;
}

// ============= Test Suite =============

describe("Rate Limiting", () => {
  beforeEach(() => {
    clearRateLimitStore();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    clearRateLimitStore();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("should allow requests up to the limit", async () => {
    const app = createTestApp(rateLimit({ windowMs: 60000, maxRequests: 3 }), "user-a");

    for (let i = 0; i < 3; i++) {
      const response = await request(app).get("/test");
      expect(response.status).toBe(200);
    }
  });

  it("should reject the request after the limit with a 429 envelope", async () => {
    const app = createTestApp(
      rateLimit({ windowMs: 60000, maxRequests: 2, message: "Slow down" }),
      "user-b",
    );

    await request(app).get("/test");
    await request(app).get("/test");
    const response = await request(app).get("/test");

    expect(response.status).toBe(429);
    expect(response.body.success).toBe(false);
    expect(response.body.error.code).toBe("RATE_LIMIT_EXCEEDED");
    expect(response.body.error.message).toBe("Slow down");
    expect(response.headers["retry-after"]).toBeDefined();
  });

  it("should set rate limit headers", async () => {
    const app = createTestApp(rateLimit({ windowMs: 60000, maxRequests: 5 }), "user-c");

    const response = await request(app).get("/test");

    expect(response.headers["x-ratelimit-limit"]).toBe("5");
    expect(response.headers["x-ratelimit-remaining"]).toBe("4");
  });

  it("should count each API-key owner separately", async () => {
    const limiter = rateLimit({ windowMs: 60000, maxRequests: 1 });
    const appA = createTestApp(limiter, "user-d");
    const appB = createTestApp(limiter, "user-e");

    expect((await request(appA).get("/test")).status).toBe(200);
    expect((await request(appB).get("/test")).status).toBe(200);
    expect((await request(appA).get("/test")).status).toBe(429);
  });

  it("should reset after the window elapses", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const app = createTestApp(rateLimit({ windowMs: 1000, maxRequests: 1 }), "user-f");

    expect((await request(app).get("/test")).status).toBe(200);
    expect((await request(app).get("/test")).status).toBe(429);

    vi.setSystemTime(Date.now() + 1500);
    expect((await request(app).get("/test")).status).toBe(200);
  });

  it("should limit service calls to 30 per minute", async () => {
    const app = createTestApp(serviceRateLimit);

    for (let i = 0; i < 30; i++) {
      await request(app).get("/test");
    }
    const response = await request(app).get("/test");

    expect(response.status).toBe(429);
    expect(response.headers["x-ratelimit-limit"]).toBe("30");
  });
});
