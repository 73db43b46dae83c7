import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["extensions/**/*.test.ts"],
    environment: "node",
    env: {
      EMAIL_IDENTITY_LOG_LEVEL: "silent",
    },
  },
});
