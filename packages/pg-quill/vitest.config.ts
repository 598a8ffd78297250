import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        // Entry points
        "src/cli.ts",
        "src/index.ts",
        "**/*.test.ts",
      ],
    },
  },
});
