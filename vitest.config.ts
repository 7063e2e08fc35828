import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // PGlite boots a wasm Postgres per suite; give it room on slow machines.
    testTimeout: 20_000,
    hookTimeout: 30_000,
  },
});
