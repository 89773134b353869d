import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "feed",
    include: ["src/**/*.test.ts"],
    globals: true,
    coverage: {
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.test.ts",
        "src/index.ts",
        "src/types/**",
        "src/lib/logger.ts",
        "src/test-helpers.ts",
      ],
    },
  },
});
