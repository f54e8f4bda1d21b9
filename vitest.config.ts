import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

function pkg(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  test: {
    env: {
      STACKGATE_LOG_FORMAT: "hidden",
    },
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    alias: {
      "@stackgate/logger": pkg("./packages/logger/src/index.ts"),
      "@stackgate/core": pkg("./packages/core/src/index.ts"),
      "@stackgate/artifacts": pkg("./packages/artifacts/src/index.ts"),
      "@stackgate/orchestrator": pkg("./packages/orchestrator/src/index.ts"),
    },
  },
});
