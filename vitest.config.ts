import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 15_000,
  },
});
