import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@neurocue/contracts": pkg("contracts/index.ts"),
      "@neurocue/engine": pkg("engine/src/index.ts"),
      "@neurocue/adapters": pkg("adapters/src/index.ts"),
      "@neurocue/runner": pkg("runner/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
  },
});
