import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./packages/shared/src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    setupFiles: ["test/setup.global.ts"],
    include: [
      "apps/**/src/**/*.{test,spec}.ts",
      "apps/**/src/**/__tests__/**/*.test.ts",
      "packages/**/src/**/*.{test,spec}.ts",
      "packages/**/src/**/__tests__/**/*.test.ts",
    ],
  },
});
