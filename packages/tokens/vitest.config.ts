import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenrules/tokens",
    globals: true,
    environment: "node",
  },
});
