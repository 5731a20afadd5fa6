import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@shiftctl/shared": source("shared"),
      "@shiftctl/deployer": source("deployer"),
    },
  },
});
