import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@media-inspector/core": path.resolve(__dirname, "packages/core/src/index.ts"),
      "@media-inspector/probe": path.resolve(__dirname, "packages/probe/src/index.ts"),
      "@media-inspector/catalogue": path.resolve(
        __dirname,
        "packages/catalogue/src/index.ts"
      )
    }
  },
  test: {
    include: ["packages/**/__tests__/**/*.test.ts", "apps/**/__tests__/**/*.test.ts"]
  }
});
