import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@orderflow/fulfillment-service",
    environment: "node",
    include: ["tests/unit/**/*.test.ts", "tests/steps/**/*.steps.ts"],
    testTimeout: 30000,
  },
});
