import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@marklet/core",
    globals: true,
    environment: "node",
    // config file tests change the working directory
    pool: "forks",
  },
});
