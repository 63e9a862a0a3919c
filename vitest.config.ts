import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: "@agentic-wire/sdk/testing", replacement: fromRoot("./packages/sdk/src/testing/index.ts") },
      { find: "@agentic-wire/sdk", replacement: fromRoot("./packages/sdk/src/index.ts") },
      { find: "@agentic-wire/shared", replacement: fromRoot("./packages/shared/src/index.ts") },
      { find: "@agentic-wire/core", replacement: fromRoot("./packages/core/src/index.ts") },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "packages/*/__tests__/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
});
