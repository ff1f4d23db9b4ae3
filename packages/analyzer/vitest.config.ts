import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@valuekit/analyzer",
    globals: true,
    environment: "node",
  },
});
