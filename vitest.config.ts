import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const workspace = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@spooltag/shared": workspace("shared"),
      "@spooltag/bridge": workspace("bridge"),
      "@spooltag/agent": workspace("agent"),
      "@spooltag/cli": workspace("cli"),
    },
  },
  test: {
    include: [
      "tests/integration/**/*.test.ts",
      // package-local tests
      "packages/*/tests/**/*.test.ts",
    ],
    environment: "node",
    reporters: ["default"],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
