import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@snpctl/core": pkg("core"),
      "@snpctl/transport-ssh": pkg("transport-ssh"),
      "@snpctl/attestor": pkg("attestor"),
      "@snpctl/launcher": pkg("launcher"),
      "@snpctl/workflow": pkg("workflow"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    testTimeout: 20_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["**/*.test.ts", "**/index.ts"],
    },
  },
});
