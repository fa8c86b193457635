import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@utilkit/collections",
    globals: true,
    environment: "node",
  },
});
