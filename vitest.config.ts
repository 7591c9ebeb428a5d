import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/backend/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
  },
});
