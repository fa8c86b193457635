import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@utilkit/number",
    globals: true,
    environment: "node",
  },
});
