import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@expandite/core",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
