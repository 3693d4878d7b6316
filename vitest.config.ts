import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@agentpod/core": source("core"),
      "@agentpod/terminal": source("terminal"),
      "@agentpod/containers": source("containers"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
