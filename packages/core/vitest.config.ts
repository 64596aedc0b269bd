import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenrules/core",
    globals: true,
    environment: "node",
  },
});
