import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "extensions/**/*.test.ts"],
    env: {
      CLINICDESK_LOG_LEVEL: "silent",
    },
    testTimeout: 10_000,
  },
});
