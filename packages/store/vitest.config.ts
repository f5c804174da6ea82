import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@service-catalog/store": fileURLToPath(new URL("./src/index.ts", import.meta.url)),
      "@service-catalog/testkit": fileURLToPath(
        new URL("../testkit/src/index.ts", import.meta.url)
      ),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: { CATALOG_LOG_LEVEL: "error" },
  },
});
