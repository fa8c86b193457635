import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@utilkit/array",
    globals: true,
    environment: "node",
  },
});
