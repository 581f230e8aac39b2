import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Exhaustive proof sweeps build thousands of trees
    testTimeout: 60000,
  },
});
