import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@marklet/markup",
    globals: true,
    environment: "node",
  },
});
