import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["src/**/*.test.ts"],
    testTimeout: 10000, // 10 second timeout per test
    hookTimeout: 10000,
  },
});
