import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@utilkit/core",
    pool: "forks",
    globals: true,
    environment: "node",
  },
});
