import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@caution/core",
    globals: true,
    environment: "node",
  },
});
