import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/**/*.test.ts", "packages/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve the workspace package to its sources
      "@slot-scanner/shared": fileURLToPath(
        new URL("./packages/shared/index.ts", import.meta.url),
      ),
    },
  },
});
