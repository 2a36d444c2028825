import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "unit",
    include: ["packages/*/src/**/*.test.ts", "apps/*/test/**/*.test.ts"],
    environment: "node",
  },
});
