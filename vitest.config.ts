// /vitest.config.ts (workspace root)
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    reporters: ["default"],
    include: [
      "backend/services/shared/src/**/*.test.ts",
      "backend/services/validation/test/**/*.spec.ts",
    ],
    setupFiles: ["backend/services/validation/test/setup.ts"],
    hookTimeout: 20_000,
    testTimeout: 20_000,
  },
});
