import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["api/__tests__/**/*.test.ts"],
    setupFiles: ["api/__tests__/vitest.setup.ts"],
    testTimeout: 20_000,
  },
});
