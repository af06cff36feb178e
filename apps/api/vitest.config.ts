import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "api",
    include: [
      "src/**/*.{test,spec}.ts",
      "src/**/__tests__/**/*.{test,spec}.ts",
    ],
    environment: "node",
    // Image decoding and canvas work run on native threads.
    testTimeout: 15000,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      reportsDirectory: "./coverage",
      include: ["src/**/*.ts"],
      exclude: ["src/**/__tests__/**", "src/**/*.test.ts"],
    },
    reporters: process.env.CI ? ["default", "junit"] : ["default"],
    outputFile: process.env.CI ? { junit: "coverage/junit.xml" } : undefined,
  },
  resolve: {
    alias: [
      {
        find: /^@postural\/i18n-tools$/,
        replacement: fileURLToPath(
          new URL("../../packages/i18n-tools/src/index.ts", import.meta.url),
        ),
      },
    ],
  },
});
