import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "error",
      ERROR_LOG_ENABLED: "false",
      BLAND_API_KEY: "test-key",
    },
  },
});
