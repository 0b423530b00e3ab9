import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        // clipanion's .mjs build imports a directory, which Node's ESM loader rejects
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/cli/banner.ts",
        "src/cli/program.ts",
        "src/cli/commands/run.ts",
        "src/gateway/lifecycle.ts",
        "src/config/types.ts",
      ],
    },
  },
});
