import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@valuekit/derive",
    globals: true,
    environment: "node",
  },
});
