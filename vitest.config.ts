import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["main/**/*.{test,spec}.ts", "shared/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 15000,
  },
});
