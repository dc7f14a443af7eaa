import swc from "unplugin-swc";
import { defineConfig } from "vitest/config";

export default defineConfig({
  // esbuild drops decorator metadata, which constructor injection reads
  plugins: [swc.vite({ module: { type: "es6" } })],
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.d.ts"],
      thresholds: process.env.CI
        ? {
            functions: 80,
            branches: 80,
            lines: 80,
            statements: 80,
          }
        : undefined,
    },
  },
});
