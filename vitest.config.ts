import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "processing",
    include: ["packages/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
  },
});
