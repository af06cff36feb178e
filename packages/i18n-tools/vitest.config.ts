import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "i18n-tools",
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
});
