import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    // the CLI tests build real TypeScript programs, lib files included
    testTimeout: 30000,
    hookTimeout: 30000,
    alias: {
      "@wirekit/annotations": packageEntry("annotations"),
      "@wirekit/generator": packageEntry("generator"),
      "@wirekit/cli": packageEntry("cli"),
    },
  },
});
