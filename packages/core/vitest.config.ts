import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@valuekit/core",
    globals: true,
    environment: "node",
  },
});
