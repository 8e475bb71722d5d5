// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    reporters: ["default"],
    include: ["backend/shared/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
