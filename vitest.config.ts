import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    // PGlite boots a full Postgres per worker; the first migration run can take a few seconds.
    testTimeout: 20_000,
    hookTimeout: 30_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
      exclude: [
        "**/*.test.ts",
        "**/*.d.ts",
        // Pure type-only files (interfaces/types, no runtime logic)
        "src/usage/repository-types.ts",
        "src/usage/usage-record-repository.ts",
        "src/usage/purchase-journal-repository.ts",
        // Barrel re-export file
        "src/db/schema/index.ts",
        // Process entrypoint
        "src/index.ts",
      ],
    },
  },
});
