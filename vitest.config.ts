import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@scrapeflow/shared": path.resolve(__dirname, "packages/shared/src/index.ts"),
      "@scrapeflow/web-runner": path.resolve(__dirname, "web-runner/src/index.ts"),
    },
  },
  test: {
    include: ["**/tests/**/*.test.ts", "**/tests/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
  },
});
