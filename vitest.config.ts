import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      HONEYTALLY_LOG_FORMAT: "hidden",
    },
    testTimeout: 20_000,
  },
});
