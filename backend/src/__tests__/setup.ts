/**
 * Test setup file
 * Runs before all tests to configure the test environment
 */

// IMPORTANT: This file is loaded by Vitest before test modules.
// Set env vars at import time (not inside hooks) so any module-level DB
// initialization uses the test database.

process.env.DATABASE_URL = "file::memory:?cache=shared";
process.env.NODE_ENV = "test";

// Shared bot-to-backend secret
process.env.SERVICE_TOKEN = "test-service-token";

// The delivery worker never reaches a real bot in tests
process.env.BOT_DELIVERY_URL = "http://bot.test";
