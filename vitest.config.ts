import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
      OPENAI_API_KEY: "test-openai-key",
      TZ: "America/Toronto",
    },
  },
});
