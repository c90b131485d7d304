import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // Keep pino quiet; individual tests install their own logger when they need output
    env: {
      FILEGUARD_LOGGING_LEVEL: "silent",
    },
  },
});
