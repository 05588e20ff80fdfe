import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@caution/display",
    globals: true,
    environment: "node",
  },
});
