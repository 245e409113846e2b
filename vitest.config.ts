import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (path: string): string => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@execmon\/sdk\/testing$/, replacement: pkg("sdk/src/testing/index.ts") },
      { find: /^@execmon\/sdk$/, replacement: pkg("sdk/src/index.ts") },
      { find: /^@execmon\/shared$/, replacement: pkg("shared/src/index.ts") },
      { find: /^@execmon\/core$/, replacement: pkg("core/src/index.ts") },
    ],
  },
});
