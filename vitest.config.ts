import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // CLI tests spawn node with the tsx loader
    testTimeout: 20_000,
  },
});
