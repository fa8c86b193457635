import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@utilkit/strings",
    globals: true,
    environment: "node",
  },
});
