import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_SILENT: "true",
    },
    testTimeout: 10_000,
  },
});
