import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const fromRoot = (dir: string): string =>
  fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": fromRoot("app"),
      "@config": fromRoot("config"),
      "@domain": fromRoot("domain"),
      "@infra": fromRoot("infrastructure"),
      "@interfaces": fromRoot("interfaces"),
      "@middleware": fromRoot("middleware"),
      "@routes": fromRoot("routes"),
      "@utils": fromRoot("utils"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      LOG_FILE: "",
    },
  },
});
