import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@keyladder/types": pkg("types"),
      "@keyladder/core": pkg("core"),
      "@keyladder/storage": pkg("storage"),
      "@keyladder/engine": pkg("engine"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
