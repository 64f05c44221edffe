import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@marklet/parser",
    globals: true,
    environment: "node",
  },
});
