import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.spec.ts", "packages/*/tests/**/*.spec.ts"],
    environment: "node",
  },
});
