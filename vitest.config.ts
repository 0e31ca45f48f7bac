import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/tests/**/*.spec.ts", "packages/*/tests/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    coverage: {
      clean: true,
      enabled: true,
      include: ["apps/*/src/**", "packages/*/src/**"],
      exclude: ["apps/report-api/src/main.ts"],
      reporter: ["json-summary", "lcov", "text"],
      provider: "v8",
    },
  },
});
