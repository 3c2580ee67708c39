import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["server/src/**/__tests__/**/*.test.ts"],
    environment: "node",
    // PGlite boots a WASM Postgres per test file; the first boot is slow on cold caches.
    testTimeout: 20_000,
    hookTimeout: 30_000,
  },
});
