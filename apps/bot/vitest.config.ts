import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    // Env must be in place before @nestfinder/config parses process.env
    setupFiles: ["./test/setup-env.ts"],
    include: ["src/__tests__/unit/**/*.test.ts"],
    // Each repository test boots an in-memory PGlite instance
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
