import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@marklet/css",
    globals: true,
    environment: "node",
  },
});
