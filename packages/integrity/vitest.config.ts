import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

const sourcePath = (path: string) =>
  fileURLToPath(new URL(`src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "entity-integrity/memory": sourcePath("backend/memory/index.ts"),
      "entity-integrity/postgres": sourcePath("backend/postgres/index.ts"),
      "entity-integrity/sqlite": sourcePath("backend/sqlite/index.ts"),
      "entity-integrity": sourcePath("index.ts"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "**/dist/**"],
    globals: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts"],
      thresholds: {
        branches: 70,
        functions: 75,
        lines: 75,
      },
    },
  },
});
