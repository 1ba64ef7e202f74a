import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@relaykit\/sdk\/testing$/, replacement: fromRoot("./packages/sdk/src/testing/index.ts") },
      { find: /^@relaykit\/sdk$/, replacement: fromRoot("./packages/sdk/src/index.ts") },
      { find: /^@relaykit\/shared$/, replacement: fromRoot("./packages/shared/src/index.ts") },
      { find: /^@relaykit\/core$/, replacement: fromRoot("./packages/core/src/index.ts") },
      { find: /^@relaykit\/provider-openrouter$/, replacement: fromRoot("./packages/provider-openrouter/src/index.ts") },
    ],
  },
});
