import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    alias: {
      "@modkeeper/logger": pkg("logger"),
      "@modkeeper/core": pkg("core"),
      "@modkeeper/storage": pkg("storage"),
      "@modkeeper/installer": pkg("installer"),
      "@modkeeper/updater": pkg("updater"),
    },
  },
});
