import { defineConfig } from "vitest/config";

/**
 * Unit tests: pure parsing, merge and ranking logic plus file-based
 * report builds in temp directories. No network.
 */
export default defineConfig({
  test: {
    include: ["tests/unit/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    testTimeout: 5000,
    pool: "threads",
    environment: "node",
    clearMocks: true,
    restoreMocks: true,
  },
});
