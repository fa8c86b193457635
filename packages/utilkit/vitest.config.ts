import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "utilkit",
    globals: true,
    environment: "node",
  },
});
