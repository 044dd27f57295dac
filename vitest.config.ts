import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    // the Porter stemmer takes tens of seconds on the 70k-character word fixtures
    testTimeout: 120_000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
