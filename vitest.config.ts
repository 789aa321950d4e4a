import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      ROLEGUARD_EMBEDDING_PROVIDER: "none",
      LOG_LEVEL: "silent"
    }
  }
});
