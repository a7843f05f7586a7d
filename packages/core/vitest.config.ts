import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "core",
    include: ["test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    globals: true,
  },
});
