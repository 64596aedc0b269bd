import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tokenrules/fragments",
    globals: true,
    environment: "node",
  },
});
