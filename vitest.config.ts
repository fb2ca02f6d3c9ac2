import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/lib/**/*.ts"],
      thresholds: {
        statements: 90,
        branches: 90,
        functions: 95,
        lines: 90,
      },
    },
  },
});
