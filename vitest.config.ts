import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string): string => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    // Building the base environment parses the standard library files
    testTimeout: 30000,
    hookTimeout: 30000,
    alias: {
      "@playbench/shared": source("shared"),
      "@playbench/template": source("template"),
      "@playbench/compiler": source("compiler"),
    },
  },
});
