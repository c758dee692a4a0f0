/**
 * Test helpers for integration tests
 *
 * Provides:
 * - In-memory test database setup (same lazy client the app uses)
 * - Fixture registration through the real service layer
 * - Delivery queue draining
 */

import { getClient } from "../db/index.js";
import { initializeSchema } from "../db/init.js";
import { createApp } from "../app.js";
import { clearRateLimitStore } from "../middleware/rateLimit.js";
import { deliveryQueue, type DeliveryJob } from "../services/deliveryQueue.js";
import { registerUser } from "../services/users.js";

export const SERVICE_TOKEN = "test-service-token";

/**
 * Create the schema in the shared in-memory database (idempotent).
 */
export async function createTestDb() {
  const client = getClient();
  await initializeSchema(client);
  return client;
}

/**
 * Remove every row so each test starts from an empty database.
 */
export async function resetDb() {
  await getClient().executeMultiple(`
    DELETE FROM notifications;
    DELETE FROM processes;
    DELETE FROM users;
  `);
  clearRateLimitStore();
  await drainQueue();
}

/**
 * Take everything currently queued for delivery, in order.
 */
export async function drainQueue(): Promise<DeliveryJob[]> {
  const jobs: DeliveryJob[] = [];
  while (deliveryQueue.size > 0) {
    const job = await deliveryQueue.take();
    if (job) jobs.push(job);
    deliveryQueue.done();
  }
  return jobs;
}

export function createTestApp() {
  return createApp();
}

let userCounter = 0;

/**
 * Register a fresh user and return their identity plus key.
 */
export async function createTestUser(overrides: { chatId?: string; displayName?: string } = {}) {
  userCounter++;
  const platformUserId = `90000${userCounter}`;
  const chatId = overrides.chatId ?? `70000${userCounter}`;
  const { apiKey } = await registerUser({
    platformUserId,
    chatId,
    displayName: overrides.displayName ?? `Test User ${userCounter}`,
  });
  return { platformUserId, chatId, apiKey };
}

export function bearer(apiKey: string) {
  return { Authorization: `Bearer ${apiKey}` };
}

export function serviceHeaders() {
  return { "X-Service-Token": SERVICE_TOKEN };
}
