import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources
    conditions: ["source"],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    globals: false,
    environment: "node",
  },
});
