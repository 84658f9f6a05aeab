import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@expandite/builtins",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
