import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts", "apps/*/tests/**/*.test.ts"],
    environment: "node",
    // PGlite boots a WASM Postgres per test file
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
