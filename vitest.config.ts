import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["generator/tests/**/*.test.ts", "e2e/tests/**/*.test.ts"],
    testTimeout: 30000,
  },
});
