import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    // Use threads for faster parallel test execution
    pool: "threads",
    include: ["tests/unit/**/*.test.ts"],
    // Parse anomalies are logged as warnings; keep test output readable
    env: {
      LOG_LEVEL: "error",
    },
  },
});
