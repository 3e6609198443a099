import * as path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shelfkeep/catalog": path.resolve(__dirname, "../catalog/src/index.ts"),
    },
  },
  test: {
    root: ".",
    include: ["tests/**/*.test.ts"],
    globals: false,
    testTimeout: 10000,
  },
});
