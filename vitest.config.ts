import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      OCMF_ENV: "test",
      OCMF_LOG_LEVEL: "silent",
    },
  },
});
