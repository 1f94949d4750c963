import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: "./",
    include: ["packages/*/tests/**/*.test.ts", "apps/*/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
