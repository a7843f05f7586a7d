import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "declarations",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**", "test/fixtures/**"],
    environment: "node",
    testTimeout: 10000,
    globals: true,
  },
});
