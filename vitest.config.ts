import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    restoreMocks: true,
    clearMocks: true,
    environment: "node",
    passWithNoTests: false,
    pool: "forks",
    testTimeout: 20000,
    hookTimeout: 30000,
    exclude: ["**/node_modules/**", "**/dist/**"]
  }
});
