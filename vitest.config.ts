import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/src/**/*.test.ts", "bot/tests/**/*.test.ts", "client/tests/**/*.test.ts"],
    // Each file gets its own process, so the shared in-memory database never leaks between files
    pool: "forks",
    setupFiles: ["./backend/src/__tests__/setup.ts", "./bot/tests/setup.ts"],
    testTimeout: 10_000,
  },
});
