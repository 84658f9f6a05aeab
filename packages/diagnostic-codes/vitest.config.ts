import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@expandite/diagnostic-codes",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
