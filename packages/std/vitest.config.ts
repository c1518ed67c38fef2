import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@ordkit/std",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
