import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Keep log output deterministic regardless of the developer's shell.
    env: {
      LAZYLIST_LOG_LEVEL: "",
      LAZYLIST_DEBUG: "",
      LAZYLIST_API_BASE_URL: "",
      LAZYLIST_PAGE_SIZE: "",
      LAZYLIST_PHOTO_CAPACITY: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/testing/**"],
      reporter: ["text", "text-summary", "lcov"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    testTimeout: 10000,
  },
});
