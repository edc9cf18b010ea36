import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      RUNNER_LOG_LEVEL: "silent",
    },
  },
});
