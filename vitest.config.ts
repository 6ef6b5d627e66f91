import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["services/*/src/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent"
    }
  }
});
