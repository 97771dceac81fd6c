import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.integration.test.ts"],
    testTimeout: 600_000,
    hookTimeout: 120_000,
  },
});
