// /vitest.config.mts (workspace root; .mts so Vite loads it as ESM)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/*/test/**/*.spec.ts",
      "backend/tools/*/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/shared/test/setup.ts"],
    hookTimeout: 30_000,
    testTimeout: 30_000,
  },
});
