import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // clipanion's ESM build imports a directory ("../platform"), which Node's
    // ESM loader rejects; let Vite transform it so the import resolves.
    server: {
      deps: {
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/engine/index.ts",
        "src/cli/main.ts",
        "src/config/types.ts",
        "src/learning/types.ts",
        "src/engine/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
