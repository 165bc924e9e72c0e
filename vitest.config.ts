import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      DB_PATH: ":memory:",
      SCHEDULER_ENABLED: "false",
    },
  },
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "hono/jsx",
  },
});
