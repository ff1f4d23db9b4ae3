import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@valuekit/runtime",
    globals: true,
    environment: "node",
  },
});
