import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    testTimeout: 20_000,
    hookTimeout: 20_000,
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@labfleet/shared": fromRoot("./packages/shared/src/index.ts"),
      "@labfleet/orchestrator": fromRoot("./packages/orchestrator/src/index.ts"),
    },
  },
});
