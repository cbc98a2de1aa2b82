import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["api/**/*.test.ts", "shared/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
  },
});
