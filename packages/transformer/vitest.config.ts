import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@valuekit/transformer",
    globals: true,
    environment: "node",
  },
});
