import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const workspace = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@opsbridge/sdk": workspace("./packages/sdk/src/index.ts"),
      "@opsbridge/testkit": workspace("./packages/testkit/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
