import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenrules/macros",
    globals: true,
    environment: "node",
  },
});
