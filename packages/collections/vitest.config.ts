import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@ordkit/collections",
    globals: true,
    environment: "node",
    pool: "forks",
    include: ["tests/**/*.test.ts"],
  },
});
