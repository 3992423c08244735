import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Mirror tests run real git against local bare repositories
    testTimeout: 30000,
    include: ["tests/**/*.test.ts"],
  },
});
