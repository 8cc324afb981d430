import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    globals: false,
    environment: "node",
  },
  resolve: {
    alias: {
      "@transcript-sync/telemetry": fileURLToPath(new URL("./packages/telemetry/src/index.ts", import.meta.url)),
    },
  },
});
