import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@utilkit/long-tuple",
    globals: true,
    environment: "node",
  },
});
